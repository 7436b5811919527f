/**
 * The settings editor: "<profile> ➣ <setting> ➣ <value>", where profile "0"
 * is the defaults record.
 */

import {
  InvalidSettingValueError,
  ProfileNotFoundError,
  UnknownSettingError,
} from "@fuzzy-folders/core/errors";
import {
  DEFAULTS_PROFILE_ID,
  getProfile,
  updateSetting,
  validateSettingValue,
} from "@fuzzy-folders/core/profiles";
import { DELIMITER, parseSettingsQuery, type SettingsQuery } from "@fuzzy-folders/core/query";
import {
  SCOPE_ALL,
  SCOPE_FILES,
  SCOPE_FOLDERS,
  SCOPE_NAMES,
  isSearchScope,
  isSettingName,
  type SearchScope,
  type SettingName,
} from "@fuzzy-folders/core/schemas";
import {
  Feedback,
  ICON_ERROR,
  ICON_INFO,
  ICON_SETTINGS,
  ICON_WARNING,
  ICON_WORKFLOW,
  icon,
} from "@fuzzy-folders/workflow/feedback";
import type { CommandContext } from "../context.js";

const SETTING_LABELS: Record<SettingName, string> = {
  min: "minimum query length",
  scope: "search scope",
};

interface ScopeChoice {
  title: string;
  subtitle: string;
  value: SearchScope | 0;
}

const SCOPE_CHOICES: ScopeChoice[] = [
  { title: "Folders only", subtitle: "Only search for folders", value: SCOPE_FOLDERS },
  { title: "Files only", subtitle: "Only search for files", value: SCOPE_FILES },
  { title: "Folders and files", subtitle: "Search for folders and files", value: SCOPE_ALL },
  { title: "Default", subtitle: "Use default setting", value: 0 },
];

/** How a setting value reads in titles and messages. */
export function describeValue(setting: SettingName, value: number): string {
  if (value === 0) {
    return "default";
  }
  if (setting === "scope" && isSearchScope(value)) {
    return SCOPE_NAMES[value];
  }
  return String(value);
}

function settingArg(profileId: string, setting: SettingName, value?: number): string {
  return `${profileId} ${DELIMITER} ${setting} ${DELIMITER} ${value ?? ""}`;
}

/** Which record the editor works on, as shown in its header. */
interface EditorRecord {
  title: string;
  subtitle: string;
  min?: number;
  scope?: SearchScope;
}

function editorRecord(ctx: CommandContext, profileId: string): EditorRecord | undefined {
  const settings = ctx.settings.current;
  if (profileId === DEFAULTS_PROFILE_ID) {
    const { min, scope } = settings.defaults;
    return {
      title: "Fuzzy Folder Defaults",
      subtitle: "Overridden by Folder-specific settings",
      min,
      scope,
    };
  }
  const profile = getProfile(settings, profileId);
  if (!profile) {
    return undefined;
  }
  return {
    title: profile.keyword,
    subtitle: profile.dirpath,
    min: profile.min,
    scope: profile.scope,
  };
}

function listSettings(feedback: Feedback, profileId: string, record: EditorRecord): void {
  feedback.add({
    title: record.title,
    subtitle: record.subtitle,
    valid: false,
    icon: icon(ICON_WORKFLOW),
  });

  const minArg = settingArg(profileId, "min");
  feedback.add({
    title: `Minimum query length : ${record.min ?? "default"}`,
    subtitle: "The last part of your query must be this long to trigger a search",
    arg: minArg,
    autocomplete: minArg,
    valid: false,
    icon: icon(ICON_SETTINGS),
  });

  const scopeArg = settingArg(profileId, "scope");
  feedback.add({
    title: `Search scope : ${record.scope !== undefined ? SCOPE_NAMES[record.scope] : "default"}`,
    subtitle: "Should results be folders and/or files?",
    arg: scopeArg,
    autocomplete: scopeArg,
    valid: false,
    icon: icon(ICON_SETTINGS),
  });
}

function promptForValue(feedback: Feedback, profileId: string, setting: SettingName): void {
  if (setting === "min") {
    feedback.notice("Enter a minimum query length", "Enter 0 to use default", ICON_INFO);
    return;
  }
  for (const choice of SCOPE_CHOICES) {
    feedback.add({
      title: choice.title,
      subtitle: choice.subtitle,
      arg: settingArg(profileId, "scope", choice.value),
      valid: true,
      icon: icon(ICON_SETTINGS),
    });
  }
}

function editorFeedback(
  ctx: CommandContext,
  { profileId, setting, value }: SettingsQuery,
): Feedback {
  const feedback = new Feedback();

  const record = editorRecord(ctx, profileId);
  if (!record) {
    return feedback.notice(
      "No such keyword / Fuzzy Folder",
      `Profile ${profileId} is not defined`,
      ICON_WARNING,
    );
  }

  if (setting === undefined) {
    listSettings(feedback, profileId, record);
    return feedback;
  }

  if (!isSettingName(setting)) {
    throw new UnknownSettingError(setting);
  }

  if (value === undefined) {
    promptForValue(feedback, profileId, setting);
    return feedback;
  }

  validateSettingValue(setting, value);
  return feedback.add({
    title: `Set ${SETTING_LABELS[setting]} to ${describeValue(setting, value)}`,
    subtitle: "↩ to update",
    arg: settingArg(profileId, setting, value),
    valid: true,
    icon: icon(ICON_SETTINGS),
  });
}

/** Show or edit the settings of a profile (or of the defaults). */
export async function settingsCommand(ctx: CommandContext, query: string): Promise<void> {
  // Trailing space deleted: back up to the profile's settings
  if (query.endsWith(DELIMITER)) {
    const [profileId] = query.split(DELIMITER);
    await ctx.host.runTrigger("set", profileId.trim());
    return;
  }

  let feedback: Feedback;
  try {
    const parsed = parseSettingsQuery(query);
    ctx.logger.debug(parsed, "Settings query");
    if (!parsed.profileId) {
      await ctx.host.runTrigger("search");
      return;
    }
    feedback = editorFeedback(ctx, parsed);
  } catch (err) {
    if (err instanceof UnknownSettingError || err instanceof InvalidSettingValueError) {
      feedback = new Feedback().notice(err.message, "Hit ⌫ to choose again", ICON_ERROR);
    } else {
      throw err;
    }
  }

  ctx.out.write(feedback.serialize());
}

/** Apply "<profile> ➣ <setting> ➣ <value>" and report the new value. */
export async function updateSettingCommand(ctx: CommandContext, query: string): Promise<void> {
  try {
    const { profileId, setting = "", value } = parseSettingsQuery(query);
    ctx.logger.debug({ profileId, setting, value }, "Updating setting");

    if (!isSettingName(setting)) {
      throw new UnknownSettingError(setting);
    }
    if (value === undefined) {
      throw new InvalidSettingValueError(setting, "");
    }
    await ctx.settings.commit(updateSetting(ctx.settings.current, profileId, setting, value));
    ctx.out.write(`${SETTING_LABELS[setting]} set to ${describeValue(setting, value)}`);
  } catch (err) {
    if (
      err instanceof UnknownSettingError ||
      err instanceof InvalidSettingValueError ||
      err instanceof ProfileNotFoundError
    ) {
      ctx.logger.error({ err }, "Setting not updated");
      ctx.out.write(err.message);
      return;
    }
    throw err;
  }
}

/** Open the settings editor for a profile in Alfred. */
export async function loadSettingsCommand(ctx: CommandContext, profileId: string): Promise<void> {
  await ctx.host.runTrigger("set", profileId);
}
