export {
  DEFAULT_BUNDLE_ID,
  ALFRED_DATA_ROOT,
  SETTINGS_FILENAME,
  INFO_PLIST_FILENAME,
  HELP_FILENAME,
} from "./defaults.js";
export {
  loadSettings,
  saveSettings,
  type LoadSettingsOptions,
} from "./loader.js";
export { expandHomePath, resolveDataDir } from "./paths.js";
export {
  WorkflowEnvSchema,
  resolveWorkflowConfig,
  type WorkflowEnv,
  type WorkflowConfig,
} from "./env.js";
