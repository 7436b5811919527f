import { stat } from "node:fs/promises";
import { homedir } from "node:os";
import { resolve } from "node:path";
import { expandHomePath } from "../config/paths.js";

/** Absolute form of a user-supplied directory path ("~" expanded). */
export function toDirpath(input: string, home: string = homedir()): string {
  return resolve(expandHomePath(input, home));
}

/** Absolute path, always ending in "/". */
export function absSlash(path: string, home: string = homedir()): string {
  const p = toDirpath(path, home);
  return p.endsWith("/") ? p : p + "/";
}

/** Absolute path, never ending in "/" unless it is "/". */
export function absNoSlash(path: string, home: string = homedir()): string {
  const p = toDirpath(path, home);
  return p.endsWith("/") && p !== "/" ? p.slice(0, -1) : p;
}

/** Display form with the home prefix replaced by "~/", ending in "/". */
export function abbrSlash(path: string, home: string = homedir()): string {
  const p = absSlash(path, home);
  const prefix = absSlash(home, home);
  return p.startsWith(prefix) ? "~/" + p.slice(prefix.length) : p;
}

/** Display form without trailing slash; "/" and "~/" are kept as they are. */
export function abbrNoSlash(path: string, home: string = homedir()): string {
  const p = abbrSlash(path, home);
  return p === "/" || p === "~/" ? p : p.slice(0, -1);
}

/** Display form of an arbitrary (file) path. Comparisons never use this. */
export function abbreviate(path: string, home: string = homedir()): string {
  const prefix = absSlash(home, home);
  return path.startsWith(prefix) ? "~/" + path.slice(prefix.length) : path;
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err: unknown) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "ENOENT" || code === "ENOTDIR" || code === "EACCES") {
      return false;
    }
    throw err;
  }
}

export interface RootAndQuery {
  root: string;
  query: string;
}

/**
 * Split a typed path into an existing root and the fragment after its last
 * slash. A path that is already a directory is returned whole with an empty
 * query; nothing here fails for roots that do not exist.
 */
export async function splitRootAndQuery(
  input: string,
  home: string = homedir(),
): Promise<RootAndQuery> {
  const dirpath = toDirpath(input, home);

  if (await isDirectory(absSlash(dirpath, home))) {
    return { root: dirpath, query: "" };
  }

  const pos = absNoSlash(dirpath, home).lastIndexOf("/");
  if (pos === -1) {
    return { root: dirpath, query: "" };
  }

  return {
    root: pos === 0 ? "/" : dirpath.slice(0, pos),
    query: dirpath.slice(pos + 1),
  };
}
