import { resolveWorkflowConfig } from "@fuzzy-folders/core/config";
import { createLogger } from "@fuzzy-folders/core/logger";
import { createCommandContext } from "./context.js";
import { createProgram } from "./program.js";

async function main(): Promise<void> {
  const config = resolveWorkflowConfig();
  const logger = createLogger(config.logging);
  logger.debug({ argv: process.argv.slice(2) }, "Invoked");

  const program = createProgram(() => createCommandContext(config, { logger }));

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    logger.error({ err }, "Command failed");
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error("Failed to start:", err);
  process.exit(1);
});
