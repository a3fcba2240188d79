import type { GameSnapshot, NextTurn, PlayedTurn } from "./actors/GameActor.js";
import type { Command, ServerContext } from "./commands/Command.js";
import { ConfigureGame } from "./commands/ConfigureGame.js";
import { ConnectPlayer } from "./commands/ConnectPlayer.js";
import { DisconnectPlayer } from "./commands/DisconnectPlayer.js";
import { dispatchCommand } from "./commands/dispatchCommand.js";
import { EndGame } from "./commands/EndGame.js";
import { HostGame } from "./commands/HostGame.js";
import { JoinGame } from "./commands/JoinGame.js";
import { LeaveGame } from "./commands/LeaveGame.js";
import { PlayTurn } from "./commands/PlayTurn.js";
import {
  DescribeGame,
  DescribePlayer,
  DescribeServer,
  ListPlayers,
  type ServerSummary,
} from "./commands/queries.js";
import { ResetServer } from "./commands/ResetServer.js";
import { RestartGame } from "./commands/RestartGame.js";
import { StartGame } from "./commands/StartGame.js";
import type { PlayerState } from "./entities/PlayerLedger.js";
import type { GameConfig, GameConfigOverrides } from "./GameConfig.js";
import type { Result } from "./Result.js";
import type { PlayerName, TimePoint } from "./typedefs.js";

/*
 * Player-facing verbs. Each one builds a command stamped with the context's
 * clock and dispatches it. Malformed input rejects with GameCommandInputError
 * before anything is dispatched; expected failures come back as results.
 */

async function run<TValue>(
  ctx: ServerContext,
  build: (at: TimePoint) => Command<TValue>,
): Promise<Result<TValue>> {
  return dispatchCommand(build(ctx.now()), ctx);
}

export function connect(ctx: ServerContext, player: PlayerName): Promise<Result<PlayerState>> {
  return run(ctx, (at) => new ConnectPlayer(player, at));
}

export function disconnect(ctx: ServerContext, player: PlayerName): Promise<Result<void>> {
  return run(ctx, (at) => new DisconnectPlayer(player, at));
}

export function host(
  ctx: ServerContext,
  player: PlayerName,
  gameName?: string,
): Promise<Result<GameSnapshot>> {
  return run(ctx, (at) => new HostGame(player, gameName, at));
}

/** Joins the game `existingPlayer` is in, or the most recently hosted game. */
export function join(
  ctx: ServerContext,
  player: PlayerName,
  existingPlayer?: PlayerName,
): Promise<Result<readonly PlayerName[]>> {
  return run(ctx, (at) => new JoinGame(player, existingPlayer, at));
}

export function leave(ctx: ServerContext, player: PlayerName): Promise<Result<readonly PlayerName[]>> {
  return run(ctx, (at) => new LeaveGame(player, at));
}

export function configure(
  ctx: ServerContext,
  hostName: PlayerName,
  overrides: GameConfigOverrides,
): Promise<Result<GameConfig>> {
  return run(ctx, (at) => new ConfigureGame(hostName, overrides, at));
}

export function start(ctx: ServerContext, player: PlayerName): Promise<Result<NextTurn>> {
  return run(ctx, (at) => new StartGame(player, at));
}

export function play(
  ctx: ServerContext,
  player: PlayerName,
  guess: number,
): Promise<Result<PlayedTurn>> {
  return run(ctx, (at) => new PlayTurn(player, guess, at));
}

export function restart(ctx: ServerContext, hostName: PlayerName): Promise<Result<NextTurn>> {
  return run(ctx, (at) => new RestartGame(hostName, at));
}

export function end(ctx: ServerContext, hostName: PlayerName): Promise<Result<void>> {
  return run(ctx, (at) => new EndGame(hostName, at));
}

export function players(ctx: ServerContext): Promise<Result<readonly PlayerName[]>> {
  return run(ctx, (at) => new ListPlayers(at));
}

export function gameInfo(ctx: ServerContext, player: PlayerName): Promise<Result<GameSnapshot>> {
  return run(ctx, (at) => new DescribeGame(player, at));
}

export function playerInfo(ctx: ServerContext, player: PlayerName): Promise<Result<PlayerState>> {
  return run(ctx, (at) => new DescribePlayer(player, at));
}

export function serverInfo(ctx: ServerContext): Promise<Result<ServerSummary>> {
  return run(ctx, (at) => new DescribeServer(at));
}

export function reset(ctx: ServerContext): Promise<Result<void>> {
  return run(ctx, (at) => new ResetServer(at));
}
