export {
  WorkflowError,
  MalformedQueryError,
  ProfileNotFoundError,
  UnknownSettingError,
  InvalidSettingValueError,
  IndexerFailureError,
  TriggerRegistryError,
} from './catalog.js'
