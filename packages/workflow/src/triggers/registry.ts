/**
 * Keeps the workflow's info.plist in step with the stored profiles.
 */

import { copyFile, readFile, rename, utimes, writeFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import plist, { type PlistObject, type PlistValue } from "plist";
import type { Logger } from "pino";
import { TriggerRegistryError } from "@fuzzy-folders/core/errors";
import type { SearchProfile } from "@fuzzy-folders/core/schemas";
import {
  TRIGGER_CONNECTIONS,
  YPOS_START,
  YPOS_STEP,
  connectionsValue,
  createScriptFilter,
  isPlistObject,
  profileTriggerUid,
  type TriggerConnection,
} from "./script-filter.js";

interface Sections {
  objects: readonly PlistValue[];
  uidata: PlistObject;
  connections: PlistObject;
}

function sections(doc: PlistObject): Sections {
  const { objects, uidata, connections } = doc;
  if (!Array.isArray(objects)) {
    throw new TriggerRegistryError("info.plist has no objects list");
  }
  if (!isPlistObject(uidata) || !isPlistObject(connections)) {
    throw new TriggerRegistryError("info.plist has no uidata or connections");
  }
  return { objects, uidata, connections };
}

function without(map: PlistObject, uids: ReadonlySet<string>): PlistObject {
  return Object.fromEntries(Object.entries(map).filter(([uid]) => !uids.has(uid)));
}

/** Drop generated profile triggers with their positions and connections. */
export function removeProfileTriggers(doc: PlistObject): {
  doc: PlistObject;
  removed: number;
} {
  const { objects, uidata, connections } = sections(doc);
  const uids = new Set<string>();
  const keep: PlistValue[] = [];

  for (const obj of objects) {
    const uid = profileTriggerUid(obj);
    if (uid === undefined) {
      keep.push(obj);
    } else {
      uids.add(uid);
    }
  }

  return {
    doc: {
      ...doc,
      objects: keep,
      uidata: without(uidata, uids),
      connections: without(connections, uids),
    },
    removed: uids.size,
  };
}

export interface AppendOptions {
  newUid?: () => string;
  home?: string;
  connections?: TriggerConnection[];
}

/** Append one Script Filter per profile, stacked vertically. */
export function appendProfileTriggers(
  doc: PlistObject,
  profiles: SearchProfile[],
  options: AppendOptions = {},
): PlistObject {
  const newUid = options.newUid ?? (() => randomUUID().toUpperCase());
  const outbound = connectionsValue(options.connections ?? TRIGGER_CONNECTIONS);
  const { objects, uidata, connections } = sections(doc);

  const added: PlistValue[] = [];
  const positions: Record<string, PlistValue> = {};
  const links: Record<string, PlistValue> = {};

  profiles.forEach((profile, i) => {
    const uid = newUid();
    added.push(createScriptFilter(profile, uid, options.home));
    positions[uid] = { ypos: YPOS_START + i * YPOS_STEP };
    links[uid] = outbound;
  });

  return {
    ...doc,
    objects: [...objects, ...added],
    uidata: { ...uidata, ...positions },
    connections: { ...connections, ...links },
  };
}

export function parseInfoPlist(xml: string): PlistObject {
  let parsed: PlistValue;
  try {
    parsed = plist.parse(xml);
  } catch (err) {
    throw new TriggerRegistryError(
      `Cannot parse info.plist: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!isPlistObject(parsed)) {
    throw new TriggerRegistryError("info.plist is not a dictionary");
  }
  return parsed;
}

const POSITION_INTEGER_RE = /(<key>[xy]pos<\/key>\s*)<integer>(-?\d+)<\/integer>/g;

/** plist writes whole numbers as integers; Alfred stores canvas positions as reals. */
export function buildInfoPlist(doc: PlistObject): string {
  return plist.build(doc).replace(POSITION_INTEGER_RE, "$1<real>$2</real>");
}

export interface SyncResult {
  removed: number;
  added: number;
}

export interface TriggerRegistry {
  sync(profiles: SearchProfile[]): Promise<SyncResult>;
}

export interface TriggerRegistryOptions extends AppendOptions {
  plistPath: string;
  logger?: Logger;
}

/**
 * Rewrite info.plist: backup to .bak, write .temp, rename over the
 * original, touch it so Alfred notices.
 */
export async function syncProfileTriggers(
  profiles: SearchProfile[],
  options: TriggerRegistryOptions,
): Promise<SyncResult> {
  const { plistPath, logger } = options;
  const tempPath = plistPath + ".temp";

  const xml = await readFile(plistPath, "utf-8");
  await copyFile(plistPath, plistPath + ".bak");

  const { doc, removed } = removeProfileTriggers(parseInfoPlist(xml));
  logger?.debug({ removed }, "Script Filters deleted from info.plist");

  const next = appendProfileTriggers(doc, profiles, options);
  await writeFile(tempPath, buildInfoPlist(next), "utf-8");
  await rename(tempPath, plistPath);
  const now = new Date();
  await utimes(plistPath, now, now);

  logger?.debug({ added: profiles.length }, "Wrote Script Filters to info.plist");
  return { removed, added: profiles.length };
}

export function createTriggerRegistry(options: TriggerRegistryOptions): TriggerRegistry {
  return {
    sync: (profiles) => syncProfileTriggers(profiles, options),
  };
}
