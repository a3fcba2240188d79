import type { GameActor } from "../actors/GameActor.js";
import { gameChannel } from "../ports/MessageBus.js";
import { fail, ok, type Result } from "../Result.js";
import type { GameId, PlayerName, TimePoint } from "../typedefs.js";
import type { ServerContext } from "./Command.js";
import { resolveGame } from "./resolve.js";

/** Releases every roster player, stops the game and drops it from the registry. */
export async function closeGame(
  ctx: ServerContext,
  game: GameActor,
  at: TimePoint,
): Promise<readonly PlayerName[]> {
  const { players, games, bus, logger } = ctx;

  const { id, players: roster } = await game.info();
  await Promise.all(roster.map((player) => players.leaveGame(player, id)));

  game.stop();
  await games.unregister(id);

  logger?.info?.("Game closed", { gameId: id, at });

  await bus.publish(gameChannel(id), {
    type: "GameClosed",
    gameId: id,
    players: [...roster],
    at,
  });

  return roster;
}

/**
 * Frees a player to take a seat elsewhere. A game that has ended is left
 * (or closed, when the player hosts it); any other game keeps the player
 * and yields `player_in_game`. Sitting in `target` already is not a move.
 */
export async function vacateEndedGame(
  ctx: ServerContext,
  player: PlayerName,
  target: GameId | undefined,
  at: TimePoint,
): Promise<Result<void>> {
  const current = await resolveGame(ctx, player);
  if (!current.ok || current.value.id === target) return ok(undefined);

  const game = current.value;
  const { id, host, status } = await game.info();
  if (status !== "ended") return fail("player_in_game");

  if (host === player) {
    await closeGame(ctx, game, at);
    return ok(undefined);
  }

  // A restart may have reopened the game since the status check.
  const roster = await game.removePlayer(player);
  if (!roster.ok) return fail("player_in_game");

  await ctx.players.leaveGame(player, id);
  await ctx.bus.publish(gameChannel(id), {
    type: "PlayerLeft",
    gameId: id,
    player,
    players: [...roster.value],
    at,
  });

  return ok(undefined);
}
