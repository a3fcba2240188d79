import type { Result } from "../Result.js";
import type { Command, ServerContext } from "./Command.js";

export async function dispatchCommand<TValue>(
  command: Command<TValue>,
  ctx: ServerContext,
): Promise<Result<TValue>> {
  const started = Date.now();

  try {
    ctx.logger?.info?.(`[CMD] ${command.type}`, { command });
    const result = await command.execute(ctx);

    if (result.ok) {
      ctx.logger?.info?.(`[CMD OK] ${command.type}`, { ms: Date.now() - started });
    } else {
      ctx.logger?.info?.(`[CMD REJECTED] ${command.type}`, {
        error: result.error,
        ms: Date.now() - started,
      });
    }

    return result;
  } catch (error) {
    ctx.logger?.error?.(`[CMD ERR] ${command.type}`, { error });
    throw error;
  }
}
