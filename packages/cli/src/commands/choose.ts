import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { rankItems } from "@fuzzy-folders/core/filter";
import {
  abbrNoSlash,
  abbrSlash,
  absNoSlash,
  absSlash,
  isDirectory,
  splitRootAndQuery,
} from "@fuzzy-folders/core/paths";
import { Feedback, ICON_WARNING, fileIcon } from "@fuzzy-folders/workflow/feedback";
import type { CommandContext } from "../context.js";

interface Folder {
  name: string;
  path: string;
}

async function listFolders(root: string): Promise<Folder[]> {
  const names = (await readdir(root)).filter((name) => !name.startsWith(".")).sort();
  const folders: Folder[] = [];
  for (const name of names) {
    const path = join(root, name);
    // Follows symlinks, unlike Dirent.isDirectory()
    if (await isDirectory(path)) {
      folders.push({ name, path });
    }
  }
  return folders;
}

/** Browse the subfolders of `dir` to pick one to add. */
export async function chooseCommand(ctx: CommandContext, dir: string): Promise<void> {
  const { home, logger } = ctx;
  const { root, query } = await splitRootAndQuery(dir, home);
  logger.debug({ root, query }, "Browsing folder");

  const feedback = new Feedback();

  if (!(await isDirectory(root))) {
    logger.debug({ root }, "Does not exist or is not a directory");
    feedback.notice("Folder does not exist", abbrNoSlash(root, home), ICON_WARNING);
    ctx.out.write(feedback.serialize());
    return;
  }

  if (!query) {
    const abbr = abbrNoSlash(root, home);
    feedback.add({
      title: abbr,
      subtitle: `Add ${abbr} as a new Fuzzy Folder`,
      arg: absSlash(root, home),
      autocomplete: abbrSlash(root, home),
      valid: true,
      type: "file",
      icon: fileIcon(absNoSlash(root, home)),
    });
  }

  let folders = await listFolders(root);
  logger.debug({ count: folders.length, root }, "Folders found");
  if (query && folders.length > 0) {
    folders = rankItems(query, folders, (folder) => folder.name);
  }

  for (const folder of folders) {
    feedback.add({
      title: folder.name,
      subtitle: `Add ${abbrNoSlash(folder.path, home)} as a new Fuzzy Folder`,
      arg: absNoSlash(folder.path, home),
      autocomplete: abbrSlash(folder.path, home),
      valid: true,
      type: "file",
      icon: fileIcon(folder.path),
    });
  }

  ctx.out.write(feedback.serialize());
}
