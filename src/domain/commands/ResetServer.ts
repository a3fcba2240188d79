import { SERVER_CHANNEL } from "../ports/MessageBus.js";
import { ok, type Result } from "../Result.js";
import type { TimePoint } from "../typedefs.js";
import { Command, type ServerContext } from "./Command.js";

/** Stops every game and player actor. Safe to repeat. */
export class ResetServer extends Command {
  readonly type = "ResetServer" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute(ctx: ServerContext): Promise<Result<void>> {
    const { players, games, bus, logger } = ctx;

    await games.clear();
    await players.clear();

    logger?.info?.("Server reset", { type: this.type, at: this.at });
    await bus.publish(SERVER_CHANNEL, { type: "ServerReset", at: this.at });

    return ok(undefined);
  }
}
