/**
 * In-process command context for tests: settings in memory, fakes for the
 * indexer, Alfred and the trigger registry, output collected in an array.
 */

import { vi, type Mock } from "vitest";
import { pino } from "pino";
import type { WorkflowConfig } from "@fuzzy-folders/core/config";
import type { Indexer } from "@fuzzy-folders/core/indexer";
import {
  WorkflowSettingsSchema,
  type WorkflowSettings,
} from "@fuzzy-folders/core/schemas";
import type { AlfredHost } from "@fuzzy-folders/workflow/host";
import type { FeedbackDocument } from "@fuzzy-folders/workflow/feedback";
import type { TriggerRegistry } from "@fuzzy-folders/workflow/triggers";
import type { CommandContext, SettingsStore } from "../context.js";

export const TEST_HOME = "/Users/test";

export const TEST_CONFIG: WorkflowConfig = {
  bundleId: "fuzzy-folders-test",
  dataDir: "/tmp/fuzzy-folders-test/data",
  workflowDir: "/tmp/fuzzy-folders-test/workflow",
  settingsPath: "/tmp/fuzzy-folders-test/data/settings.json",
  infoPlistPath: "/tmp/fuzzy-folders-test/workflow/info.plist",
  helpPath: "/tmp/fuzzy-folders-test/workflow/README.html",
  logging: { level: "info", pretty: false },
};

export interface FakeHost {
  runTrigger: Mock<AlfredHost["runTrigger"]>;
  search: Mock<AlfredHost["search"]>;
  reloadWorkflow: Mock<AlfredHost["reloadWorkflow"]>;
  open: Mock<AlfredHost["open"]>;
}

export interface TestContext {
  ctx: CommandContext;
  /** Everything written to the output, one entry per write */
  output: string[];
  /** Every document passed to commit */
  commits: WorkflowSettings[];
  host: FakeHost;
  indexerSearch: Mock<Indexer["search"]>;
  sync: Mock<TriggerRegistry["sync"]>;
  /** The last output parsed as a feedback document */
  feedback(): FeedbackDocument;
}

export interface TestContextOptions {
  /** Raw settings document; defaults are filled in by the schema */
  settings?: unknown;
  /** Paths the fake indexer returns */
  hits?: string[];
  home?: string;
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const output: string[] = [];
  const commits: WorkflowSettings[] = [];

  let current = WorkflowSettingsSchema.parse(options.settings ?? {});
  const settings: SettingsStore = {
    get current() {
      return current;
    },
    async commit(next) {
      commits.push(next);
      current = next;
    },
  };

  const host: FakeHost = {
    runTrigger: vi.fn<AlfredHost["runTrigger"]>().mockResolvedValue(undefined),
    search: vi.fn<AlfredHost["search"]>().mockResolvedValue(undefined),
    reloadWorkflow: vi.fn<AlfredHost["reloadWorkflow"]>().mockResolvedValue(undefined),
    open: vi.fn<AlfredHost["open"]>().mockResolvedValue(undefined),
  };
  const indexerSearch = vi.fn<Indexer["search"]>().mockResolvedValue(options.hits ?? []);
  const sync = vi
    .fn<TriggerRegistry["sync"]>()
    .mockImplementation(async (profiles) => ({ removed: 0, added: profiles.length }));

  const ctx: CommandContext = {
    config: TEST_CONFIG,
    logger: pino({ level: "silent" }),
    home: options.home ?? TEST_HOME,
    settings,
    indexer: { search: indexerSearch },
    host,
    triggers: { sync },
    out: { write: (text) => void output.push(text) },
  };

  return {
    ctx,
    output,
    commits,
    host,
    indexerSearch,
    sync,
    feedback() {
      const last = output.at(-1);
      if (last === undefined) {
        throw new Error("Nothing was written");
      }
      return JSON.parse(last) as FeedbackDocument;
    },
  };
}
