import type { GameActor } from "../actors/GameActor.js";
import { PlayerActor } from "../actors/PlayerActor.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { fail, ok, type Result } from "../Result.js";
import type { PlayerName } from "../typedefs.js";
import type { ServerContext } from "./Command.js";

export function playerNameIssues(name: unknown, label = "Player name"): string[] {
  if (typeof name !== "string" || name.trim().length === 0) {
    return [`${label} must be a non-empty string`];
  }
  if (name !== name.trim()) {
    return [`${label} must not start or end with whitespace`];
  }
  return [];
}

export function assertPlayerNames(
  names: ReadonlyArray<readonly [label: string, name: unknown]>,
): void {
  GameCommandInputError.assertNone(
    names.flatMap(([label, name]) => playerNameIssues(name, label)),
  );
}

/** Looks the player up, registering a fresh actor when the name is free. */
export async function ensurePlayer(ctx: ServerContext, name: PlayerName): Promise<PlayerActor> {
  const { players, logger } = ctx;

  for (;;) {
    const existing = await players.lookup(name);
    if (existing.ok) return existing.value;

    const actor = new PlayerActor(name, logger ? { logger } : {});
    const registered = await players.register(name, actor);
    if (registered.ok) {
      logger?.info?.("Player registered", { player: name });
      return actor;
    }

    // Lost a registration race; the winner's actor is the one to use.
    actor.stop();
  }
}

/** The game the player currently occupies. */
export async function resolveGame(
  ctx: ServerContext,
  player: PlayerName,
): Promise<Result<GameActor>> {
  const gameId = await ctx.players.gameOf(player);
  if (!gameId.ok) {
    return fail(gameId.error === "not_found" ? "player_not_found" : "game_not_found");
  }

  const game = await ctx.games.lookup(gameId.value);
  return game.ok ? ok(game.value) : fail("game_not_found");
}

/** Resolves the caller's game and checks that the caller hosts it. */
export async function resolveHostedGame(
  ctx: ServerContext,
  host: PlayerName,
): Promise<Result<GameActor>> {
  const game = await resolveGame(ctx, host);
  if (!game.ok) return game;

  const role = await game.value.role(host);
  if (!role.ok) return role;
  return role.value === "host" ? game : fail("player_not_host");
}
