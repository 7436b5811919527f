/**
 * Adding, listing and removing Fuzzy Folders (keyword → folder profiles).
 */

import { dirname } from "node:path";
import { MalformedQueryError } from "@fuzzy-folders/core/errors";
import { rankItems } from "@fuzzy-folders/core/filter";
import { abbrNoSlash, abbrSlash } from "@fuzzy-folders/core/paths";
import {
  DEFAULTS_PROFILE_ID,
  addProfile,
  findConflicts,
  getProfile,
  listProfiles,
  removeProfile,
} from "@fuzzy-folders/core/profiles";
import { DELIMITER, parseDirpathQuery } from "@fuzzy-folders/core/query";
import {
  Feedback,
  ICON_INFO,
  ICON_NOTE,
  ICON_SETTINGS,
  ICON_WARNING,
  ICON_WORKFLOW,
  icon,
} from "@fuzzy-folders/workflow/feedback";
import type { CommandContext } from "../context.js";

const NO_SUCH_PROFILE = "No such keyword / Fuzzy Folder";

/** Rewrite the profile Script Filters from the current settings. */
async function syncTriggers(ctx: CommandContext): Promise<void> {
  const result = await ctx.triggers.sync(listProfiles(ctx.settings.current));
  ctx.logger.debug(result, "Script Filters updated");
}

/** Ask Alfred for a keyword for `dir`. */
export async function addCommand(ctx: CommandContext, dir: string): Promise<void> {
  await ctx.host.runTrigger("key", `${abbrNoSlash(dir, ctx.home)} ${DELIMITER} `);
}

/** Offer "<dir> ➣ <keyword>" as a new profile, with notes on existing ones. */
export async function keywordCommand(ctx: CommandContext, query: string): Promise<void> {
  const { home } = ctx;
  const { dirpath, rest: keyword } = parseDirpathQuery(query, home);
  ctx.logger.debug({ dirpath, keyword }, "Choosing keyword");

  // Trailing space deleted: back up to the folder browser
  if (query.endsWith(DELIMITER)) {
    await ctx.host.runTrigger("choose-folder", abbrSlash(dirname(dirpath), home));
    return;
  }

  const conflicts = findConflicts(ctx.settings.current, { keyword, dirpath });
  const abbr = abbrNoSlash(dirpath, home);
  const feedback = new Feedback();

  const linkedNotes = (): void => {
    for (const profile of conflicts.sameDirpath) {
      feedback.notice(
        `Folder already linked to '${profile.keyword}'`,
        "But you can set multiple keywords per folders",
        ICON_INFO,
      );
    }
  };

  if (keyword === "") {
    feedback.notice("Enter a keyword for the Folder", dirpath, ICON_NOTE);
    linkedNotes();
  } else if (conflicts.exists) {
    feedback.notice(
      "This keyword > Fuzzy Folder already exists",
      `'${keyword}' already linked to ${abbr}`,
      ICON_WARNING,
    );
  } else {
    feedback.add({
      title: `Set '${keyword}' as keyword for ${abbr}`,
      subtitle: dirpath,
      arg: `${dirpath} ${DELIMITER} ${keyword}`,
      valid: true,
      icon: icon(ICON_WORKFLOW),
    });
    linkedNotes();
    for (const profile of conflicts.sameKeyword) {
      feedback.notice(
        `'${profile.keyword}' searches ${abbrNoSlash(profile.dirpath, home)}`,
        "But you can use the same keyword for multiple folders",
        ICON_INFO,
      );
    }
  }

  ctx.out.write(feedback.serialize());
}

/**
 * Save "<dir> ➣ <keyword>" as a new profile. Without a query, only rewrite
 * the Script Filters.
 */
export async function updateCommand(ctx: CommandContext, query?: string): Promise<void> {
  if (query) {
    const { dirpath, rest: keyword } = parseDirpathQuery(query, ctx.home);
    if (keyword === "") {
      throw new MalformedQueryError("Keyword is empty", { query });
    }
    const { settings, profile } = addProfile(ctx.settings.current, { keyword, dirpath });
    await ctx.settings.commit(settings);
    ctx.logger.debug({ profile }, "Profile added");

    await syncTriggers(ctx);
    ctx.out.write(`Keyword '${keyword}' searches ${abbrNoSlash(dirpath, ctx.home)}`);
  } else {
    await syncTriggers(ctx);
  }

  await ctx.host.reloadWorkflow();
}

export async function removeCommand(ctx: CommandContext, profileId: string): Promise<void> {
  const settings = ctx.settings.current;
  if (!getProfile(settings, profileId)) {
    ctx.logger.debug({ profileId }, "Profile not found");
    ctx.out.write(NO_SUCH_PROFILE);
    return;
  }

  await ctx.settings.commit(removeProfile(settings, profileId));
  ctx.logger.debug({ profileId }, "Profile removed");
  await syncTriggers(ctx);
  ctx.out.write("Deleted keyword / Fuzzy Folder");
}

/** The defaults entry followed by every profile matching `query`. */
export async function manageCommand(ctx: CommandContext, query?: string): Promise<void> {
  let profiles = listProfiles(ctx.settings.current);
  if (query) {
    profiles = rankItems(query, profiles, (p) => `${p.keyword} ${p.dirpath}`, {
      allChars: false,
    });
  }

  const feedback = new Feedback().add({
    title: "Default Fuzzy Folder settings",
    subtitle: "View / change settings",
    arg: DEFAULTS_PROFILE_ID,
    valid: true,
    icon: icon(ICON_SETTINGS),
  });

  if (profiles.length === 0) {
    feedback.notice(
      "No Fuzzy Folders defined",
      "Use the 'Add Fuzzy Folder' File Action to add some",
      ICON_WARNING,
    );
  }

  for (const profile of profiles) {
    feedback.add({
      title: `${profile.keyword} ${DELIMITER} ${abbrNoSlash(profile.dirpath, ctx.home)}`,
      subtitle: "View / change settings",
      arg: profile.id,
      autocomplete: profile.keyword,
      valid: true,
      icon: icon(ICON_WORKFLOW),
    });
  }

  ctx.out.write(feedback.serialize());
}

/** Open a profile's keyword in Alfred; "0" opens the workflow's main menu. */
export async function loadProfileCommand(
  ctx: CommandContext,
  profileId: string,
): Promise<void> {
  if (profileId === DEFAULTS_PROFILE_ID) {
    await ctx.host.runTrigger("fuzzy-folders");
    return;
  }

  const profile = getProfile(ctx.settings.current, profileId);
  if (!profile) {
    ctx.out.write(NO_SUCH_PROFILE);
    return;
  }
  ctx.logger.debug({ profile }, "Loading profile");
  await ctx.host.search(`${profile.keyword} `);
}
