export {
  SCOPE_FOLDERS,
  SCOPE_FILES,
  SCOPE_ALL,
  SCOPE_NAMES,
  DEFAULTS,
  SETTING_NAMES,
  SearchScopeSchema,
  ProfileIdSchema,
  SearchDefaultsSchema,
  ProfileSchema,
  WorkflowSettingsSchema,
  isSearchScope,
  isSettingName,
  type SearchScope,
  type SearchDefaults,
  type Profile,
  type SearchProfile,
  type SettingName,
  type WorkflowSettings,
} from "./settings.js";
export {
  LogLevelSchema,
  LoggingConfigSchema,
  type LogLevel,
  type LoggingConfig,
} from "./logging.js";
