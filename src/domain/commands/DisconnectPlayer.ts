import type { GameActor } from "../actors/GameActor.js";
import { SERVER_CHANNEL } from "../ports/MessageBus.js";
import { fail, ok, type Result } from "../Result.js";
import type { PlayerName, TimePoint } from "../typedefs.js";
import { closeGame } from "./closeGame.js";
import { Command, type ServerContext } from "./Command.js";
import { assertPlayerNames, resolveGame } from "./resolve.js";

export class DisconnectPlayer extends Command {
  readonly type = "DisconnectPlayer" as const;

  constructor(
    public readonly player: PlayerName,
    public readonly at: TimePoint,
  ) {
    super();
    assertPlayerNames([["Player name", player]]);
  }

  async execute(ctx: ServerContext): Promise<Result<void>> {
    const { players, bus, logger } = ctx;

    const actor = await players.lookup(this.player);
    if (!actor.ok) {
      return fail("player_not_found");
    }

    const game = await resolveGame(ctx, this.player);
    if (game.ok) {
      await this.#release(ctx, game.value);
    }

    await players.unregister(this.player);
    actor.value.stop();

    logger?.info?.("Player disconnected", { type: this.type, player: this.player, at: this.at });

    await bus.publish(SERVER_CHANNEL, {
      type: "PlayerDisconnected",
      player: this.player,
      at: this.at,
    });

    return ok(undefined);
  }

  /** A departing host takes the game down; a guest gives up the seat if the roster is open. */
  async #release(ctx: ServerContext, game: GameActor): Promise<void> {
    const role = await game.role(this.player);
    if (role.ok && role.value === "host") {
      await closeGame(ctx, game, this.at);
      return;
    }

    const left = await game.removePlayer(this.player);
    if (!left.ok) {
      ctx.logger?.info?.("Player keeps a roster seat after disconnecting", {
        type: this.type,
        player: this.player,
        gameId: game.id,
        reason: left.error,
      });
    }
  }
}
