import { InvalidGameStateError } from "../errors/InvalidGameStateError.js";
import { createGameConfig, validateGameConfig, type GameConfig } from "../GameConfig.js";
import { fail, ok, type Result } from "../Result.js";
import type {
  GameId,
  GameRole,
  GameStatus,
  PlayerName,
  RoundNumber,
} from "../typedefs.js";

/**
 * Snapshot of one game session. `players` is the live roster in join order;
 * `turnOrder` is the roster as it stood when the session was (re)started and
 * is what `turn` indexes.
 */
export interface GameState {
  readonly id: GameId;
  readonly host: PlayerName;
  readonly name: string;
  readonly players: readonly PlayerName[];
  readonly turnOrder: readonly PlayerName[];
  readonly round: RoundNumber;
  readonly turn: number;
  readonly config: GameConfig;
  readonly status: GameStatus;
}

const ROSTER_OPEN: readonly GameStatus[] = ["setting_up", "ended"];
const RESTARTABLE: readonly GameStatus[] = ["in_play", "ended"];

export function createGameState(
  id: GameId,
  host: PlayerName,
  name: string = host,
  config: GameConfig = createGameConfig(),
): GameState {
  return {
    id,
    host,
    name,
    players: [host],
    turnOrder: [],
    round: 0,
    turn: 0,
    config,
    status: "setting_up",
  };
}

export function roleOf(state: GameState, player: PlayerName): GameRole | undefined {
  if (state.host === player) return "host";
  return state.players.includes(player) ? "player" : undefined;
}

export function addPlayer(state: GameState, player: PlayerName): Result<GameState> {
  if (!ROSTER_OPEN.includes(state.status)) return fail("invalid_action_for_state");
  if (state.players.includes(player)) return fail("player_in_game");
  return ok({ ...state, players: [...state.players, player] });
}

export function removePlayer(state: GameState, player: PlayerName): Result<GameState> {
  if (!ROSTER_OPEN.includes(state.status)) return fail("invalid_action_for_state");
  if (!state.players.includes(player)) return fail("player_not_found");
  if (player === state.host) return fail("invalid_action_for_state");
  return ok({ ...state, players: state.players.filter((name) => name !== player) });
}

export function configure(state: GameState, config: GameConfig): Result<GameState> {
  if (!ROSTER_OPEN.includes(state.status)) return fail("invalid_action_for_state");
  return ok({ ...state, config });
}

/** Guards and state change for `start`; the caller then deals round 0. */
export function beginSession(state: GameState, caller: PlayerName): Result<GameState> {
  if (!ROSTER_OPEN.includes(state.status)) return fail("invalid_action_for_state");
  if (caller !== state.host) return fail("player_not_host");
  return ok(freshSession(state));
}

/** Guards and state change for `restart`; the caller resets players and deals round 0. */
export function restartSession(state: GameState, caller: PlayerName): Result<GameState> {
  if (!RESTARTABLE.includes(state.status)) return fail("invalid_action_for_state");
  if (caller !== state.host) return fail("player_not_host");
  return ok(freshSession(state));
}

function freshSession(state: GameState): GameState {
  return {
    ...state,
    status: "in_play",
    turnOrder: [...state.players],
    round: 0,
    turn: 0,
  };
}

export function currentActor(state: GameState): PlayerName | undefined {
  return state.status === "in_play" ? state.turnOrder[state.turn] : undefined;
}

export function requireCurrentActor(state: GameState): PlayerName {
  const player = currentActor(state);
  if (player === undefined) {
    throw new InvalidGameStateError("no player holds the turn", state);
  }
  return player;
}

export function isGuessInRange(config: GameConfig, guess: number): boolean {
  return Number.isInteger(guess) && guess >= 1 && guess <= config.maxGuess;
}

/** Checks a play request without touching the state; returns the acting player. */
export function checkPlay(
  state: GameState,
  player: PlayerName,
  guess: number,
): Result<PlayerName> {
  if (state.status !== "in_play") return fail("invalid_action_for_state");
  if (currentActor(state) !== player) return fail("wrong_turn");
  if (!isGuessInRange(state.config, guess)) return fail("out_of_range");
  return ok(player);
}

export function isLastTurn(state: GameState): boolean {
  return state.turn === state.turnOrder.length - 1;
}

export function advanceTurn(state: GameState): GameState {
  return { ...state, turn: state.turn + 1 };
}

export function advanceRound(state: GameState): GameState {
  return { ...state, round: state.round + 1, turn: 0 };
}

export function finishSession(state: GameState): GameState {
  return { ...state, status: "ended" };
}

export function reachedMaxPoints(config: GameConfig, totals: readonly number[]): boolean {
  return totals.some((total) => total >= config.maxPoints);
}

export function describeStatus(state: GameState): string {
  switch (state.status) {
    case "setting_up":
      return "Setting up";
    case "ended":
      return "Ended";
    case "in_play":
      return `Round ${state.round + 1}, ${currentActor(state) ?? "nobody"}'s turn`;
  }
}

export function summarizeGame(state: GameState): string {
  return `${state.host}'s game: ${describeStatus(state)}`;
}

export function assertValidGameState(state: GameState): void {
  const invalid = (reason: string): never => {
    throw new InvalidGameStateError(reason, state);
  };

  if (state.players.length === 0) invalid("roster is empty");
  if (new Set(state.players).size !== state.players.length) invalid("duplicate players");
  if (!state.players.includes(state.host)) invalid("host is not on the roster");
  if (!Number.isInteger(state.round) || state.round < 0) invalid("invalid round counter");

  const configIssues = validateGameConfig(state.config);
  if (configIssues.length > 0) invalid(configIssues.join("; "));

  if (state.status === "in_play") {
    if (state.turnOrder.length === 0) invalid("no turn order while in play");
    if (!Number.isInteger(state.turn) || state.turn < 0 || state.turn >= state.turnOrder.length)
      invalid("turn does not index the turn order");
    for (const player of state.turnOrder) {
      if (!state.players.includes(player)) invalid(`turn order names ${player} off the roster`);
    }
  }
}
