import { join, resolve } from "node:path";
import { z } from "zod";
import { LogLevelSchema, type LoggingConfig } from "../schemas/logging.js";
import {
  DEFAULT_BUNDLE_ID,
  HELP_FILENAME,
  INFO_PLIST_FILENAME,
  SETTINGS_FILENAME,
} from "./defaults.js";
import { expandHomePath, resolveDataDir } from "./paths.js";

/**
 * Variables Alfred exports to workflow scripts, plus our own overrides.
 */
export const WorkflowEnvSchema = z.object({
  alfred_workflow_bundleid: z.string().default(DEFAULT_BUNDLE_ID),
  alfred_workflow_data: z.string().optional(),
  alfred_debug: z.string().optional(),
  FUZZY_FOLDERS_WORKFLOW_DIR: z.string().optional(),
  FUZZY_FOLDERS_LOG_LEVEL: LogLevelSchema.optional(),
  FUZZY_FOLDERS_LOG_PRETTY: z.enum(["0", "1", "true", "false"]).optional(),
});

export type WorkflowEnv = z.infer<typeof WorkflowEnvSchema>;

export interface WorkflowConfig {
  bundleId: string;
  /** Directory holding settings.json */
  dataDir: string;
  /** Installed workflow directory holding info.plist and README.html */
  workflowDir: string;
  settingsPath: string;
  infoPlistPath: string;
  helpPath: string;
  logging: LoggingConfig;
}

export function resolveWorkflowConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): WorkflowConfig {
  // Alfred exports unset variables as empty strings
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = WorkflowEnvSchema.parse(present);

  const dataDir = resolveDataDir(
    parsed.alfred_workflow_bundleid,
    parsed.alfred_workflow_data,
  );
  const workflowDir = resolve(
    cwd,
    expandHomePath(parsed.FUZZY_FOLDERS_WORKFLOW_DIR ?? "."),
  );

  return {
    bundleId: parsed.alfred_workflow_bundleid,
    dataDir,
    workflowDir,
    settingsPath: join(dataDir, SETTINGS_FILENAME),
    infoPlistPath: join(workflowDir, INFO_PLIST_FILENAME),
    helpPath: join(workflowDir, HELP_FILENAME),
    logging: {
      level:
        parsed.FUZZY_FOLDERS_LOG_LEVEL ??
        (parsed.alfred_debug === "1" ? "debug" : "info"),
      pretty:
        parsed.FUZZY_FOLDERS_LOG_PRETTY === "1" ||
        parsed.FUZZY_FOLDERS_LOG_PRETTY === "true",
    },
  };
}
