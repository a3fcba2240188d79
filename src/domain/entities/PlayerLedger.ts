import { InvalidPlayerStateError } from "../errors/InvalidPlayerStateError.js";
import type { PlayerName, RoundNumber } from "../typedefs.js";
import { createBonus, type Bonus } from "./Bonus.js";
import {
  appendBonus,
  closeRound,
  createRound,
  isClosed,
  recordGuess,
  type PlayerRound,
} from "./PlayerRound.js";
import { roundPoints } from "./ScoringRules.js";

/** A player's score ledger. `rounds` is ordered newest first. */
export interface PlayerState {
  readonly name: PlayerName;
  readonly points: number;
  readonly rounds: readonly PlayerRound[];
}

export function createPlayerState(name: PlayerName): PlayerState {
  return { name, points: 0, rounds: [] };
}

export function currentRound(state: PlayerState): PlayerRound | undefined {
  return state.rounds[0];
}

export function sumClosedPoints(rounds: readonly PlayerRound[]): number {
  return rounds.reduce((total, round) => total + (round.points ?? 0), 0);
}

export function startRound(
  state: PlayerState,
  round: RoundNumber,
  assigned: number,
): PlayerState {
  return { ...state, rounds: [createRound(round, assigned), ...state.rounds] };
}

export function guessCurrentRound(state: PlayerState, guess: number): PlayerState {
  return updateCurrentRound(state, (round) => recordGuess(round, guess));
}

export function addCurrentRoundBonus(state: PlayerState, bonus: Bonus): PlayerState {
  const checked = createBonus(bonus.value, bonus.reason);
  return updateCurrentRound(state, (round) => appendBonus(round, checked));
}

export function closeCurrentRound(state: PlayerState): PlayerState {
  const next = updateCurrentRound(state, closeRound);
  return { ...next, points: sumClosedPoints(next.rounds) };
}

/** Closes the current round when it holds a guess and is still open. */
export function ensureCurrentRoundClosed(state: PlayerState): PlayerState {
  const round = currentRound(state);
  if (!round || round.guess === undefined || isClosed(round)) {
    return state;
  }
  return closeCurrentRound(state);
}

export function resetPlayer(state: PlayerState): PlayerState {
  return createPlayerState(state.name);
}

function updateCurrentRound(
  state: PlayerState,
  update: (round: PlayerRound) => PlayerRound,
): PlayerState {
  const [round, ...older] = state.rounds;
  if (!round) {
    throw new InvalidPlayerStateError("no round in progress", state);
  }
  return { ...state, rounds: [update(round), ...older] };
}

export function assertValidPlayerState(state: PlayerState): void {
  const fail = (reason: string): never => {
    throw new InvalidPlayerStateError(reason, state);
  };

  if (typeof state.name !== "string" || state.name.length === 0) fail("missing name");

  for (const round of state.rounds) {
    if (round.guess === undefined) {
      if (round.bonuses.length > 0) fail(`bonus without a guess in round ${round.round}`);
      if (round.points !== undefined) fail(`points without a guess in round ${round.round}`);
      continue;
    }

    if (round.points !== undefined) {
      const bonusPoints = round.bonuses.reduce((sum, bonus) => sum + bonus.value, 0);
      if (round.points !== roundPoints(round.assigned, round.guess) + bonusPoints) {
        fail(`points do not match guess and bonuses in round ${round.round}`);
      }
    }
  }

  if (state.points !== sumClosedPoints(state.rounds)) {
    fail("total points differ from the sum of closed rounds");
  }
}
