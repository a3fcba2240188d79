import type { NextTurn } from "../actors/GameActor.js";
import { gameChannel } from "../ports/MessageBus.js";
import type { Result } from "../Result.js";
import type { PlayerName, TimePoint } from "../typedefs.js";
import { Command, type ServerContext } from "./Command.js";
import { assertPlayerNames, resolveGame } from "./resolve.js";

/** Resets every player's score and deals round 0 again; configuration is kept. */
export class RestartGame extends Command<NextTurn> {
  readonly type = "RestartGame" as const;

  constructor(
    public readonly host: PlayerName,
    public readonly at: TimePoint,
  ) {
    super();
    assertPlayerNames([["Host name", host]]);
  }

  async execute(ctx: ServerContext): Promise<Result<NextTurn>> {
    const { bus, logger } = ctx;

    const game = await resolveGame(ctx, this.host);
    if (!game.ok) return game;

    const restarted = await game.value.restart(this.host);
    if (!restarted.ok) return restarted;

    logger?.info?.("Game restarted", { type: this.type, gameId: game.value.id, at: this.at });

    await bus.publish(gameChannel(game.value.id), {
      type: "GameRestarted",
      gameId: game.value.id,
      next: restarted.value,
      at: this.at,
    });

    return restarted;
  }
}
