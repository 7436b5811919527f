import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { ALFRED_DATA_ROOT } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string, home: string = homedir()): string {
  if (input === "~") {
    return home;
  }
  if (input.startsWith("~/")) {
    return resolve(home, input.slice(2));
  }
  return input;
}

/**
 * Resolves the workflow data directory (or Alfred's default for `bundleId`)
 * to an absolute path.
 */
export function resolveDataDir(bundleId: string, input?: string): string {
  return resolve(expandHomePath(input ?? join(ALFRED_DATA_ROOT, bundleId)));
}
