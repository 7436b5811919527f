import { createRequire } from "node:module";
import { Command } from "commander";
import type { CommandContext } from "./context.js";
import {
  addCommand,
  alfredSearchCommand,
  chooseCommand,
  keywordCommand,
  loadProfileCommand,
  loadSettingsCommand,
  manageCommand,
  openHelpCommand,
  removeCommand,
  searchCommand,
  settingsCommand,
  updateCommand,
  updateSettingCommand,
} from "./commands/index.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

/** Builds the context lazily, once a command has been chosen. */
export type ContextFactory = () => Promise<CommandContext>;

/**
 * Arguments are whatever the user typed in Alfred, so a leading "-" is
 * part of the query rather than an option.
 */
function freeText(command: Command): Command {
  return command.allowUnknownOption().helpOption(false);
}

export function createProgram(getContext: ContextFactory): Command {
  const program = new Command();

  program
    .name("fuzzy-folders")
    .description("Fuzzy search across folder trees from Alfred")
    .version(pkg.version)
    .enablePositionalOptions();

  freeText(program.command("choose"))
    .description("List subfolders of <dir> to add as a Fuzzy Folder")
    .argument("<dir>")
    .action(async (dir: string) => chooseCommand(await getContext(), dir));

  freeText(program.command("add"))
    .description("Ask Alfred for a keyword for <dir>")
    .argument("<dir>")
    .action(async (dir: string) => addCommand(await getContext(), dir));

  program
    .command("remove")
    .description("Delete a Fuzzy Folder")
    .argument("<profile>")
    .action(async (profile: string) => removeCommand(await getContext(), profile));

  freeText(program.command("search"))
    .description("Search a Fuzzy Folder, or \"<dir> ➣ <query>\" without a profile")
    .argument("<query>")
    .argument("[profile]")
    .action(async (query: string, profile: string | undefined) =>
      searchCommand(await getContext(), query, profile),
    );

  freeText(program.command("keyword"))
    .description("Choose a keyword: \"<dir> ➣ <keyword>\"")
    .argument("<query>")
    .action(async (query: string) => keywordCommand(await getContext(), query));

  freeText(program.command("update"))
    .description("Save \"<dir> ➣ <keyword>\" and rewrite the Script Filters")
    .argument("[query]")
    .action(async (query: string | undefined) => updateCommand(await getContext(), query));

  freeText(program.command("manage"))
    .description("List Fuzzy Folders")
    .argument("[query]")
    .action(async (query: string | undefined) => manageCommand(await getContext(), query));

  program
    .command("load-profile")
    .description("Open a Fuzzy Folder's keyword in Alfred")
    .argument("<profile>")
    .action(async (profile: string) => loadProfileCommand(await getContext(), profile));

  freeText(program.command("alfred-search"))
    .description("Start an ad-hoc search of <query> in Alfred")
    .argument("<query>")
    .action(async (query: string) => alfredSearchCommand(await getContext(), query));

  program
    .command("load-settings")
    .description("Open the settings of a Fuzzy Folder in Alfred")
    .argument("<profile>")
    .action(async (profile: string) => loadSettingsCommand(await getContext(), profile));

  freeText(program.command("settings"))
    .description("Settings editor: \"<profile> ➣ <setting> ➣ <value>\"")
    .argument("<query>")
    .action(async (query: string) => settingsCommand(await getContext(), query));

  freeText(program.command("update-setting"))
    .description("Apply \"<profile> ➣ <setting> ➣ <value>\"")
    .argument("<query>")
    .action(async (query: string) => updateSettingCommand(await getContext(), query));

  program
    .command("open-help")
    .description("Open the help file")
    .action(async () => openHelpCommand(await getContext()));

  return program;
}
