export {
  SCRIPT_FILTER_TYPE,
  RESERVED_KEYWORDS,
  SEARCH_COMMAND,
  TRIGGER_CONNECTIONS,
  YPOS_START,
  YPOS_STEP,
  createScriptFilter,
  profileTriggerUid,
  profileSearchScript,
  type TriggerConnection,
} from "./script-filter.js";
export {
  appendProfileTriggers,
  createTriggerRegistry,
  parseInfoPlist,
  removeProfileTriggers,
  syncProfileTriggers,
  type AppendOptions,
  type SyncResult,
  type TriggerRegistry,
  type TriggerRegistryOptions,
} from "./registry.js";
