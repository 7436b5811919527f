export {
  ALFRED_APP_ID,
  createAlfredHost,
  runTriggerScript,
  searchScript,
  reloadWorkflowScript,
  type AlfredHost,
  type AlfredHostOptions,
} from "./alfred.js";
