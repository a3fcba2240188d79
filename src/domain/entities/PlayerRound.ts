import { InvalidRoundStateError } from "../errors/InvalidRoundStateError.js";
import type { RoundNumber } from "../typedefs.js";
import type { Bonus } from "./Bonus.js";
import { roundPoints } from "./ScoringRules.js";

/**
 * One player's share of a game round. A round is open until `points` is set;
 * after that it only disappears through a full player reset.
 */
export interface PlayerRound {
  readonly round: RoundNumber;
  readonly assigned: number;
  readonly guess?: number;
  readonly points?: number;
  readonly bonuses: readonly Bonus[];
}

export type ClosedRound = PlayerRound & {
  readonly guess: number;
  readonly points: number;
};

export function createRound(round: RoundNumber, assigned: number): PlayerRound {
  return { round, assigned, bonuses: [] };
}

export function isClosed(round: PlayerRound): round is ClosedRound {
  return round.points !== undefined && round.guess !== undefined;
}

export function recordGuess(round: PlayerRound, guess: number): PlayerRound {
  if (round.guess !== undefined) {
    throw new InvalidRoundStateError("guess already recorded", round);
  }
  return { ...round, guess };
}

export function appendBonus(round: PlayerRound, bonus: Bonus): PlayerRound {
  if (round.guess === undefined) {
    throw new InvalidRoundStateError("bonus added before the guess", round);
  }
  if (round.points !== undefined) {
    throw new InvalidRoundStateError("bonus added to a closed round", round);
  }
  return { ...round, bonuses: [...round.bonuses, bonus] };
}

export function closeRound(round: PlayerRound): ClosedRound {
  const { guess } = round;
  if (guess === undefined) {
    throw new InvalidRoundStateError("round closed without a guess", round);
  }
  if (round.points !== undefined) {
    throw new InvalidRoundStateError("round already closed", round);
  }

  const bonusPoints = round.bonuses.reduce((sum, bonus) => sum + bonus.value, 0);
  return { ...round, guess, points: roundPoints(round.assigned, guess) + bonusPoints };
}
