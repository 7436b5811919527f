export {
  DEFAULTS_PROFILE_ID,
  listProfiles,
  getProfile,
  requireProfile,
  nextProfileId,
  addProfile,
  removeProfile,
  updateSetting,
  validateSettingValue,
  resolveSearchOptions,
  findConflicts,
  type NewProfile,
  type SearchOptions,
  type ProfileConflicts,
} from "./store.js";
