import type { NextTurn } from "../actors/GameActor.js";
import { gameChannel } from "../ports/MessageBus.js";
import type { Result } from "../Result.js";
import type { PlayerName, TimePoint } from "../typedefs.js";
import { Command, type ServerContext } from "./Command.js";
import { assertPlayerNames, resolveGame } from "./resolve.js";

export class StartGame extends Command<NextTurn> {
  readonly type = "StartGame" as const;

  constructor(
    public readonly player: PlayerName,
    public readonly at: TimePoint,
  ) {
    super();
    assertPlayerNames([["Player name", player]]);
  }

  async execute(ctx: ServerContext): Promise<Result<NextTurn>> {
    const { bus, logger } = ctx;

    // The game checks its state before the caller's role.
    const game = await resolveGame(ctx, this.player);
    if (!game.ok) return game;

    const started = await game.value.start(this.player);
    if (!started.ok) return started;

    const { players } = await game.value.info();

    logger?.info?.("Game started", {
      type: this.type,
      gameId: game.value.id,
      players,
      at: this.at,
    });

    await bus.publish(gameChannel(game.value.id), {
      type: "GameStarted",
      gameId: game.value.id,
      players: [...players],
      next: started.value,
      at: this.at,
    });

    return started;
  }
}
