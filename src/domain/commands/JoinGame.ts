import type { GameActor } from "../actors/GameActor.js";
import { gameChannel } from "../ports/MessageBus.js";
import { fail, ok, type Result } from "../Result.js";
import type { PlayerName, TimePoint } from "../typedefs.js";
import { vacateEndedGame } from "./closeGame.js";
import { Command, type ServerContext } from "./Command.js";
import { assertPlayerNames, ensurePlayer, resolveGame } from "./resolve.js";

export class JoinGame extends Command<readonly PlayerName[]> {
  readonly type = "JoinGame" as const;

  constructor(
    public readonly player: PlayerName,
    public readonly existingPlayer: PlayerName | undefined,
    public readonly at: TimePoint,
  ) {
    super();

    const names: Array<readonly [string, unknown]> = [["Player name", player]];
    if (existingPlayer !== undefined) names.push(["Existing player name", existingPlayer]);
    assertPlayerNames(names);
  }

  async execute(ctx: ServerContext): Promise<Result<readonly PlayerName[]>> {
    const { players, bus, logger } = ctx;

    await ensurePlayer(ctx, this.player);

    const game = await this.#target(ctx);
    if (!game.ok) return game;

    const vacated = await vacateEndedGame(ctx, this.player, game.value.id, this.at);
    if (!vacated.ok) return vacated;

    const roster = await game.value.addPlayer(this.player);
    if (!roster.ok) return roster;

    await players.assignGame(this.player, game.value.id);

    logger?.info?.("Player joined game", {
      type: this.type,
      gameId: game.value.id,
      player: this.player,
      at: this.at,
    });

    await bus.publish(gameChannel(game.value.id), {
      type: "PlayerJoined",
      gameId: game.value.id,
      player: this.player,
      players: [...roster.value],
      at: this.at,
    });

    return ok(roster.value);
  }

  async #target(ctx: ServerContext): Promise<Result<GameActor>> {
    if (this.existingPlayer !== undefined) {
      return resolveGame(ctx, this.existingPlayer);
    }
    const latest = await ctx.games.latest();
    return latest.ok ? latest : fail("game_not_found");
  }
}
