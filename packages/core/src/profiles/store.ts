/**
 * Pure operations on the settings document.
 *
 * Every function returns a new document; the caller persists it once per
 * invocation.
 */

import {
  DEFAULTS,
  SCOPE_ALL,
  isSearchScope,
  type Profile,
  type SearchProfile,
  type SearchScope,
  type SettingName,
  type WorkflowSettings,
} from "../schemas/settings.js";
import {
  InvalidSettingValueError,
  ProfileNotFoundError,
  UnknownSettingError,
} from "../errors/catalog.js";

/** Profile id reserved for the defaults record in the settings editor. */
export const DEFAULTS_PROFILE_ID = "0";

/** Profiles ordered by numeric id. */
export function listProfiles(settings: WorkflowSettings): SearchProfile[] {
  return Object.entries(settings.profiles)
    .map(([id, profile]) => ({ id, ...profile }))
    .sort((a, b) => Number(a.id) - Number(b.id));
}

export function getProfile(
  settings: WorkflowSettings,
  id: string,
): SearchProfile | undefined {
  const profile = Object.hasOwn(settings.profiles, id)
    ? settings.profiles[id]
    : undefined;
  return profile ? { id, ...profile } : undefined;
}

export function requireProfile(
  settings: WorkflowSettings,
  id: string,
): SearchProfile {
  const profile = getProfile(settings, id);
  if (!profile) {
    throw new ProfileNotFoundError(id);
  }
  return profile;
}

/**
 * One more than the highest id in use. An id freed by deleting the highest
 * profile is handed out again.
 */
export function nextProfileId(settings: WorkflowSettings): string {
  const ids = Object.keys(settings.profiles).map(Number);
  const last = ids.length === 0 ? 0 : Math.max(...ids);
  return String(last + 1);
}

export interface NewProfile {
  keyword: string;
  dirpath: string;
}

export function addProfile(
  settings: WorkflowSettings,
  input: NewProfile,
): { settings: WorkflowSettings; profile: SearchProfile } {
  const id = nextProfileId(settings);
  const profile: Profile = {
    keyword: input.keyword,
    dirpath: input.dirpath,
    excludes: [],
  };
  return {
    settings: {
      ...settings,
      profiles: { ...settings.profiles, [id]: profile },
    },
    profile: { id, ...profile },
  };
}

export function removeProfile(
  settings: WorkflowSettings,
  id: string,
): WorkflowSettings {
  requireProfile(settings, id);
  const profiles = { ...settings.profiles };
  delete profiles[id];
  return { ...settings, profiles };
}

/** min takes any non-negative integer; scope 0 to 3. 0 means "default". */
export function validateSettingValue(setting: SettingName, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidSettingValueError(setting, value);
  }
  if (setting === "scope" && value > SCOPE_ALL) {
    throw new InvalidSettingValueError(setting, value);
  }
}

/**
 * Set `min` or `scope` on a profile, or on the defaults for id "0".
 *
 * A value of 0 means "default": the profile override is removed, and the
 * defaults record goes back to the built-in value.
 */
export function updateSetting(
  settings: WorkflowSettings,
  id: string,
  setting: string,
  value: number,
): WorkflowSettings {
  if (setting !== "min" && setting !== "scope") {
    throw new UnknownSettingError(setting);
  }
  validateSettingValue(setting, value);

  if (id === DEFAULTS_PROFILE_ID) {
    const defaults = { ...settings.defaults };
    if (setting === "min") {
      defaults.min = value === 0 ? DEFAULTS.min : value;
    } else {
      defaults.scope = isSearchScope(value) ? value : DEFAULTS.scope;
    }
    return { ...settings, defaults };
  }

  requireProfile(settings, id);
  const profile: Profile = { ...settings.profiles[id] };
  if (value === 0) {
    delete profile[setting];
  } else if (setting === "min") {
    profile.min = value;
  } else if (isSearchScope(value)) {
    profile.scope = value;
  }
  return { ...settings, profiles: { ...settings.profiles, [id]: profile } };
}

export interface SearchOptions {
  root: string;
  scope: SearchScope;
  min: number;
  excludes: string[];
}

/**
 * Effective search options: profile overrides fall back to the defaults;
 * default excludes come before the profile's own.
 */
export function resolveSearchOptions(
  settings: WorkflowSettings,
  profile: SearchProfile,
): SearchOptions {
  const { defaults } = settings;
  return {
    root: profile.dirpath,
    scope: profile.scope ?? defaults.scope,
    min: profile.min ?? defaults.min,
    excludes: [...(defaults.excludes ?? []), ...profile.excludes],
  };
}

export interface ProfileConflicts {
  /** The keyword is already linked to this folder */
  exists: boolean;
  /** Other folders searched by the same keyword */
  sameKeyword: SearchProfile[];
  /** Other keywords searching the same folder */
  sameDirpath: SearchProfile[];
}

export function findConflicts(
  settings: WorkflowSettings,
  input: NewProfile,
): ProfileConflicts {
  const conflicts: ProfileConflicts = {
    exists: false,
    sameKeyword: [],
    sameDirpath: [],
  };

  for (const profile of listProfiles(settings)) {
    if (profile.keyword === input.keyword && profile.dirpath === input.dirpath) {
      conflicts.exists = true;
    }
    if (profile.keyword === input.keyword) {
      conflicts.sameKeyword.push(profile);
    } else if (profile.dirpath === input.dirpath) {
      conflicts.sameDirpath.push(profile);
    }
  }
  return conflicts;
}
