import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_BUNDLE_ID = "fuzzy-folders";

/** Alfred keeps per-workflow data under this directory, keyed by bundle id. */
export const ALFRED_DATA_ROOT = join(
  homedir(),
  "Library",
  "Application Support",
  "Alfred",
  "Workflow Data",
);

export const SETTINGS_FILENAME = "settings.json";
export const INFO_PLIST_FILENAME = "info.plist";
export const HELP_FILENAME = "README.html";
