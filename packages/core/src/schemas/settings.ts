import { z } from "zod";

export const SCOPE_FOLDERS = 1;
export const SCOPE_FILES = 2;
export const SCOPE_ALL = 3;

export const SearchScopeSchema = z.union([
  z.literal(SCOPE_FOLDERS),
  z.literal(SCOPE_FILES),
  z.literal(SCOPE_ALL),
]);

export type SearchScope = z.infer<typeof SearchScopeSchema>;

export function isSearchScope(value: number): value is SearchScope {
  return SearchScopeSchema.safeParse(value).success;
}

export const SCOPE_NAMES: Record<SearchScope, string> = {
  [SCOPE_FOLDERS]: "folders only",
  [SCOPE_FILES]: "files only",
  [SCOPE_ALL]: "folders and files",
};

export const DEFAULTS: { min: number; scope: SearchScope } = {
  min: 1,
  scope: SCOPE_FOLDERS,
};

/** Numeric string keys: profiles are stored in a JSON object. */
export const ProfileIdSchema = z.string().regex(/^\d+$/);

export const SearchDefaultsSchema = z.object({
  min: z.number().int().min(0).default(DEFAULTS.min),
  scope: SearchScopeSchema.default(DEFAULTS.scope),
  excludes: z.array(z.string()).optional(),
});

export const ProfileSchema = z.object({
  keyword: z.string().min(1),
  dirpath: z.string().startsWith("/").describe("Absolute, no trailing slash"),
  excludes: z.array(z.string()).default([]),
  min: z.number().int().min(0).optional(),
  scope: SearchScopeSchema.optional(),
});

export const WorkflowSettingsSchema = z.object({
  defaults: SearchDefaultsSchema.default({ ...DEFAULTS }),
  profiles: z.record(ProfileIdSchema, ProfileSchema).default({}),
});

export type SearchDefaults = z.infer<typeof SearchDefaultsSchema>;
export type Profile = z.infer<typeof ProfileSchema>;
export type WorkflowSettings = z.infer<typeof WorkflowSettingsSchema>;

/** A stored profile together with its id. */
export type SearchProfile = Profile & { id: string };

export const SETTING_NAMES = ["min", "scope"] as const;
export type SettingName = (typeof SETTING_NAMES)[number];

export function isSettingName(name: string): name is SettingName {
  return (SETTING_NAMES as readonly string[]).includes(name);
}
