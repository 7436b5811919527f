/**
 * Script Filter objects in the workflow's info.plist, one per profile.
 */

import type { PlistObject, PlistValue } from "plist";
import { abbrNoSlash } from "@fuzzy-folders/core/paths";
import type { SearchProfile } from "@fuzzy-folders/core/schemas";

export const SCRIPT_FILTER_TYPE = "alfred.workflow.input.scriptfilter";

/** Script Filters shipped with the workflow; never removed */
export const RESERVED_KEYWORDS: ReadonlySet<string> = new Set([
  "fzyup",
  "fzyhelp",
  "fuzzy",
]);

export const SEARCH_COMMAND = "./bin/fuzzy-folders";

const SEARCH_SCRIPT_RE = /fuzzy-folders search (?:-- )?".+?" (\d+)/;

export const YPOS_START = 1360;
export const YPOS_STEP = 135;

/** Alfred's bit for the ⌘ modifier */
const MODIFIER_CMD = 1048576;

export interface TriggerConnection {
  destinationuid: string;
  modifiers: number;
  modifiersubtext: string;
  vitoclose: boolean;
}

/** Every profile trigger feeds the same two actions of the workflow. */
export const TRIGGER_CONNECTIONS: TriggerConnection[] = [
  // Browse folder in Alfred
  {
    destinationuid: "3AC082E0-F48F-4094-8B54-E039CDBC418B",
    modifiers: MODIFIER_CMD,
    modifiersubtext: "Browse in Alfred",
    vitoclose: false,
  },
  // Open result
  {
    destinationuid: "8DA965F1-FBE5-4283-A66A-05789AA78758",
    modifiers: 0,
    modifiersubtext: "",
    vitoclose: false,
  },
];

export function isPlistObject(value: PlistValue | undefined): value is PlistObject {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !Buffer.isBuffer(value)
  );
}

/** `--` keeps a query such as "-v" from being read as an option. */
export function profileSearchScript(profileId: string): string {
  return `${SEARCH_COMMAND} search -- "$1" ${profileId}`;
}

/**
 * The uid of `obj` if it is a Script Filter generated for a profile, else
 * undefined.
 */
export function profileTriggerUid(obj: PlistValue): string | undefined {
  if (!isPlistObject(obj) || obj.type !== SCRIPT_FILTER_TYPE) {
    return undefined;
  }
  const config = obj.config;
  if (!isPlistObject(config)) {
    return undefined;
  }
  if (typeof config.keyword === "string" && RESERVED_KEYWORDS.has(config.keyword)) {
    return undefined;
  }
  if (typeof config.script !== "string" || !SEARCH_SCRIPT_RE.test(config.script)) {
    return undefined;
  }
  return typeof obj.uid === "string" ? obj.uid : undefined;
}

export function createScriptFilter(
  profile: SearchProfile,
  uid: string,
  home?: string,
): PlistObject {
  const dirname = abbrNoSlash(profile.dirpath, home);
  return {
    type: SCRIPT_FILTER_TYPE,
    uid,
    version: 0,
    config: {
      argumenttype: 0,
      escaping: 102,
      keyword: profile.keyword,
      queuedelaycustom: 3,
      runningsubtext: "Loading files…",
      script: profileSearchScript(profile.id),
      scriptargtype: 1,
      subtext: `Fuzzy search across subdirectories of ${dirname}`,
      title: `Fuzzy Search ${dirname}`,
      type: 0,
      withspace: true,
    },
  };
}

export function connectionsValue(connections: TriggerConnection[]): PlistValue {
  return connections.map((c) => ({ ...c }));
}
