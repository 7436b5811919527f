import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { randomUUID } from "node:crypto";
import {
  WorkflowSettingsSchema,
  type WorkflowSettings,
} from "../schemas/settings.js";

export interface LoadSettingsOptions {
  settingsPath: string;
}

function serialize(settings: WorkflowSettings): string {
  return JSON.stringify(settings, null, 2) + "\n";
}

export async function loadSettings(
  options: LoadSettingsOptions,
): Promise<WorkflowSettings> {
  const { settingsPath } = options;

  let raw: string | undefined;
  try {
    raw = await readFile(settingsPath, "utf-8");
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      "code" in err &&
      (err as NodeJS.ErrnoException).code === "ENOENT"
    ) {
      // First run — defaults are installed below
    } else {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const settings = WorkflowSettingsSchema.parse(parsed);

  // Write back so that defaults are visible and editable in settings.json
  if (serialize(settings) !== raw) {
    await saveSettings(settings, options);
  }

  return settings;
}

/** Atomic write: mkdir -p, write temp file, rename */
export async function saveSettings(
  settings: WorkflowSettings,
  options: LoadSettingsOptions,
): Promise<void> {
  const { settingsPath } = options;
  await mkdir(dirname(settingsPath), { recursive: true });

  const tempPath = settingsPath + ".tmp." + randomUUID();
  await writeFile(tempPath, serialize(settings), "utf-8");
  await rename(tempPath, settingsPath);
}
