import { ok, type Result } from "../Result.js";
import type { PlayerName, TimePoint } from "../typedefs.js";
import { closeGame } from "./closeGame.js";
import { Command, type ServerContext } from "./Command.js";
import { assertPlayerNames, resolveHostedGame } from "./resolve.js";

/** Tears the host's game down and releases every roster player. */
export class EndGame extends Command {
  readonly type = "EndGame" as const;

  constructor(
    public readonly host: PlayerName,
    public readonly at: TimePoint,
  ) {
    super();
    assertPlayerNames([["Host name", host]]);
  }

  async execute(ctx: ServerContext): Promise<Result<void>> {
    const game = await resolveHostedGame(ctx, this.host);
    if (!game.ok) return game;

    await closeGame(ctx, game.value, this.at);
    return ok(undefined);
  }
}
