export {
  createCommandContext,
  createSettingsStore,
  stdoutOutput,
  type CommandContext,
  type CreateCommandContextOptions,
  type Output,
  type SettingsStore,
} from "./context.js";
export { createProgram, type ContextFactory } from "./program.js";
export * from "./commands/index.js";
