import type { CommandContext } from "../context.js";

export async function openHelpCommand(ctx: CommandContext): Promise<void> {
  ctx.logger.debug({ helpPath: ctx.config.helpPath }, "Opening help");
  await ctx.host.open(ctx.config.helpPath);
}
