export { chooseCommand } from "./choose.js";
export { openHelpCommand } from "./help.js";
export {
  addCommand,
  keywordCommand,
  loadProfileCommand,
  manageCommand,
  removeCommand,
  updateCommand,
} from "./profiles.js";
export { adHocSearchCommand, alfredSearchCommand, searchCommand } from "./search.js";
export {
  describeValue,
  loadSettingsCommand,
  settingsCommand,
  updateSettingCommand,
} from "./settings.js";
