/**
 * Spotlight (`mdfind`) backed filename search.
 */

import type { Logger } from "pino";
import { IndexerFailureError } from "../errors/catalog.js";
import { execFileUtf8, type ExecFileFn } from "../process/exec.js";
import {
  SCOPE_FILES,
  SCOPE_FOLDERS,
  type SearchScope,
} from "../schemas/settings.js";

export interface IndexerQuery {
  root: string;
  /** Case-insensitive filename substring */
  query: string;
  scope: SearchScope;
}

export interface Indexer {
  search(query: IndexerQuery): Promise<string[]>;
}

function quote(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

/** "(kMDItemFSName == '*app*'c) && (kMDItemContentType == 'public.folder')" */
export function buildMdfindQuery(query: string, scope: SearchScope): string {
  const clauses = [`(kMDItemFSName == '*${quote(query)}*'c)`];
  if (scope === SCOPE_FOLDERS) {
    clauses.push("(kMDItemContentType == 'public.folder')");
  } else if (scope === SCOPE_FILES) {
    clauses.push("(kMDItemContentType != 'public.folder')");
  }
  return clauses.join(" && ");
}

export function buildMdfindArgs(query: IndexerQuery): string[] {
  return ["-onlyin", query.root, buildMdfindQuery(query.query, query.scope)];
}

/** One path per line; blank lines dropped, NFC-normalized. */
export function parseIndexerOutput(stdout: string): string[] {
  return stdout
    .normalize("NFC")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export interface MdfindIndexerOptions {
  exec?: ExecFileFn;
  logger?: Logger;
  /** Default: "mdfind" */
  command?: string;
}

export function createMdfindIndexer(
  options: MdfindIndexerOptions = {},
): Indexer {
  const exec = options.exec ?? execFileUtf8;
  const command = options.command ?? "mdfind";
  const logger = options.logger;

  return {
    async search(query) {
      const args = buildMdfindArgs(query);
      logger?.debug({ command, args }, "Querying Spotlight index");

      let stdout: string;
      try {
        ({ stdout } = await exec(command, args));
      } catch (err) {
        throw new IndexerFailureError(
          `${command} failed: ${err instanceof Error ? err.message : String(err)}`,
          { root: query.root, query: query.query },
        );
      }

      const paths = parseIndexerOutput(stdout);
      logger?.debug({ hits: paths.length }, "Hits from Spotlight index");
      return paths;
    },
  };
}
