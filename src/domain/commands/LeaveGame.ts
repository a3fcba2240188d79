import { gameChannel } from "../ports/MessageBus.js";
import { ok, type Result } from "../Result.js";
import type { PlayerName, TimePoint } from "../typedefs.js";
import { Command, type ServerContext } from "./Command.js";
import { assertPlayerNames, resolveGame } from "./resolve.js";

export class LeaveGame extends Command<readonly PlayerName[]> {
  readonly type = "LeaveGame" as const;

  constructor(
    public readonly player: PlayerName,
    public readonly at: TimePoint,
  ) {
    super();
    assertPlayerNames([["Player name", player]]);
  }

  async execute(ctx: ServerContext): Promise<Result<readonly PlayerName[]>> {
    const { players, bus, logger } = ctx;

    const game = await resolveGame(ctx, this.player);
    if (!game.ok) return game;

    const roster = await game.value.removePlayer(this.player);
    if (!roster.ok) return roster;

    await players.leaveGame(this.player, game.value.id);

    logger?.info?.("Player left game", {
      type: this.type,
      gameId: game.value.id,
      player: this.player,
      at: this.at,
    });

    await bus.publish(gameChannel(game.value.id), {
      type: "PlayerLeft",
      gameId: game.value.id,
      player: this.player,
      players: [...roster.value],
      at: this.at,
    });

    return ok(roster.value);
  }
}
