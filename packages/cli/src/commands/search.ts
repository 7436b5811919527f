import { basename } from "node:path";
import { ProfileNotFoundError } from "@fuzzy-folders/core/errors";
import { abbrNoSlash, abbreviate } from "@fuzzy-folders/core/paths";
import {
  requireProfile,
  resolveSearchOptions,
  type SearchOptions,
} from "@fuzzy-folders/core/profiles";
import { DELIMITER, parseDirpathQuery } from "@fuzzy-folders/core/query";
import { runSearch, type SearchOutcome } from "@fuzzy-folders/core/search";
import { Feedback, ICON_WARNING, fileIcon } from "@fuzzy-folders/workflow/feedback";
import type { CommandContext } from "../context.js";

function render(outcome: SearchOutcome, home: string): Feedback {
  const feedback = new Feedback();

  if (outcome.status === "too-short") {
    return feedback.notice(
      "Query too short",
      `minimum length is ${outcome.min}`,
      ICON_WARNING,
    );
  }

  if (outcome.paths.length === 0) {
    feedback.notice("No results found", "Try a different query", ICON_WARNING);
  }

  for (const path of outcome.paths) {
    feedback.add({
      title: basename(path),
      subtitle: abbreviate(path, home),
      uid: path,
      type: "file",
      arg: path,
      valid: true,
      icon: fileIcon(path),
    });
  }
  return feedback;
}

async function search(
  ctx: CommandContext,
  query: string,
  options: SearchOptions,
): Promise<void> {
  const outcome = await runSearch(
    { ...options, query },
    { indexer: ctx.indexer, logger: ctx.logger },
  );
  ctx.out.write(render(outcome, ctx.home).serialize());
  ctx.logger.debug({ status: outcome.status }, "Finished search");
}

/**
 * Search a folder that is not stored as a profile: "<dir> ➣ <query>" with
 * the default settings. Anything without a delimiter goes back to Alfred.
 */
export async function adHocSearchCommand(
  ctx: CommandContext,
  query: string,
): Promise<void> {
  if (!query.includes(DELIMITER)) {
    ctx.logger.debug({ query }, "No delimiter, handing query back to Alfred");
    await ctx.host.search(query);
    return;
  }

  const { dirpath, rest } = parseDirpathQuery(query, ctx.home);
  const { defaults } = ctx.settings.current;
  await search(ctx, rest, {
    root: dirpath,
    scope: defaults.scope,
    min: defaults.min,
    excludes: defaults.excludes ?? [],
  });
}

export async function searchCommand(
  ctx: CommandContext,
  query: string,
  profileId?: string,
): Promise<void> {
  if (profileId === undefined) {
    return adHocSearchCommand(ctx, query);
  }

  const settings = ctx.settings.current;
  let options: SearchOptions;
  try {
    options = resolveSearchOptions(settings, requireProfile(settings, profileId));
  } catch (err) {
    if (err instanceof ProfileNotFoundError) {
      ctx.logger.debug({ profileId }, "Profile not found");
      const feedback = new Feedback().notice(
        err.message,
        `Profile ${profileId} is not defined`,
        ICON_WARNING,
      );
      ctx.out.write(feedback.serialize());
      return;
    }
    throw err;
  }

  await search(ctx, query, options);
}

/** Start an ad-hoc search of `dir` in Alfred. */
export async function alfredSearchCommand(ctx: CommandContext, dir: string): Promise<void> {
  await ctx.host.runTrigger("search", `${abbrNoSlash(dir, ctx.home)} ${DELIMITER} `);
}
