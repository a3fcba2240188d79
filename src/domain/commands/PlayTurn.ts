import type { PlayedTurn } from "../actors/GameActor.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { gameChannel } from "../ports/MessageBus.js";
import type { Result } from "../Result.js";
import type { GameId, PlayerName, TimePoint } from "../typedefs.js";
import { Command, type ServerContext } from "./Command.js";
import { assertPlayerNames, resolveGame } from "./resolve.js";

export class PlayTurn extends Command<PlayedTurn> {
  readonly type = "PlayTurn" as const;

  constructor(
    public readonly player: PlayerName,
    public readonly guess: number,
    public readonly at: TimePoint,
  ) {
    super();
    assertPlayerNames([["Player name", player]]);

    // Range is the game's call; only a value that is not a number at all is malformed.
    if (typeof guess !== "number" || Number.isNaN(guess)) {
      throw new GameCommandInputError(["Guess must be a number"]);
    }
  }

  async execute(ctx: ServerContext): Promise<Result<PlayedTurn>> {
    const game = await resolveGame(ctx, this.player);
    if (!game.ok) return game;

    const played = await game.value.play(this.player, this.guess);
    if (!played.ok) return played;

    await this.#announce(ctx, game.value.id, played.value);
    return played;
  }

  async #announce(ctx: ServerContext, gameId: GameId, played: PlayedTurn): Promise<void> {
    const { bus, logger } = ctx;
    const channel = gameChannel(gameId);
    const { scored, outcome } = played;

    logger?.info?.("Turn played", {
      type: this.type,
      gameId,
      player: this.player,
      guess: this.guess,
      points: scored.points,
      outcome: outcome.type,
      at: this.at,
    });

    await bus.publish(channel, {
      type: "TurnPlayed",
      gameId,
      player: this.player,
      guess: this.guess,
      round: scored,
      outcome,
      at: this.at,
    });

    switch (outcome.type) {
      case "next_turn":
        return;
      case "next_round":
        await bus.publish(channel, {
          type: "RoundFinished",
          gameId,
          round: outcome.round - 1,
          scores: outcome.scores,
          at: this.at,
        });
        return;
      case "ended":
        logger?.info?.("Game ended", { gameId, winners: outcome.winners, at: this.at });
        await bus.publish(channel, {
          type: "GameEnded",
          gameId,
          round: outcome.round,
          scores: outcome.scores,
          winners: outcome.winners,
          at: this.at,
        });
        return;
    }
  }
}
