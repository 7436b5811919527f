import { homedir } from "node:os";
import {
  loadSettings,
  saveSettings,
  type LoadSettingsOptions,
  type WorkflowConfig,
} from "@fuzzy-folders/core/config";
import { createLogger, type Logger } from "@fuzzy-folders/core/logger";
import { createMdfindIndexer, type Indexer } from "@fuzzy-folders/core/indexer";
import type { WorkflowSettings } from "@fuzzy-folders/core/schemas";
import { createAlfredHost, type AlfredHost } from "@fuzzy-folders/workflow/host";
import {
  createTriggerRegistry,
  type TriggerRegistry,
} from "@fuzzy-folders/workflow/triggers";

/**
 * The settings document for one invocation. Commands read `current` and
 * hand a new document to `commit`, which persists it.
 */
export interface SettingsStore {
  readonly current: WorkflowSettings;
  commit(next: WorkflowSettings): Promise<void>;
}

export function createSettingsStore(
  initial: WorkflowSettings,
  options: LoadSettingsOptions,
): SettingsStore {
  let current = initial;
  return {
    get current() {
      return current;
    },
    async commit(next) {
      await saveSettings(next, options);
      current = next;
    },
  };
}

/** Where feedback JSON and messages for Alfred's notifications go. */
export interface Output {
  write(text: string): void;
}

export const stdoutOutput: Output = {
  write(text) {
    process.stdout.write(text + "\n");
  },
};

export interface CommandContext {
  config: WorkflowConfig;
  logger: Logger;
  home: string;
  settings: SettingsStore;
  indexer: Indexer;
  host: AlfredHost;
  triggers: TriggerRegistry;
  out: Output;
}

export interface CreateCommandContextOptions {
  logger?: Logger;
  out?: Output;
}

export async function createCommandContext(
  config: WorkflowConfig,
  options: CreateCommandContextOptions = {},
): Promise<CommandContext> {
  const logger = options.logger ?? createLogger(config.logging);
  const home = homedir();
  const storeOptions = { settingsPath: config.settingsPath };
  const settings = await loadSettings(storeOptions);

  logger.debug(
    { settingsPath: config.settingsPath, profiles: Object.keys(settings.profiles).length },
    "Settings loaded",
  );

  return {
    config,
    logger,
    home,
    settings: createSettingsStore(settings, storeOptions),
    indexer: createMdfindIndexer({ logger }),
    host: createAlfredHost({ bundleId: config.bundleId, logger }),
    triggers: createTriggerRegistry({
      plistPath: config.infoPlistPath,
      logger,
      home,
    }),
    out: options.out ?? stdoutOutput,
  };
}
