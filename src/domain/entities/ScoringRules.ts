import type { PlayerName } from "../typedefs.js";
import {
  EXACT_MATCH_BONUS,
  OTHER_MATCH_BONUS,
  REVERSE_MATCH_BONUS,
  type Bonus,
} from "./Bonus.js";

export const BASE_POINTS = 100;

/** Another roster member's assigned number for the round being scored */
export interface OpponentAssignment {
  readonly player: PlayerName;
  readonly assigned: number;
}

/** Closeness score. Not clamped: wide guess ranges can produce negative points. */
export function roundPoints(assigned: number, guess: number): number {
  return BASE_POINTS - Math.abs(guess - assigned);
}

/** Numeric reversal of the decimal digits; leading zeros fall away (40 -> 4). */
export function reverseDigits(value: number): number {
  const reversed = String(Math.abs(value)).split("").reverse().join("");
  return Math.sign(value) * Number.parseInt(reversed, 10);
}

export function computeBonuses(
  assigned: number,
  guess: number,
  opponents: readonly OpponentAssignment[],
): Bonus[] {
  const bonuses: Bonus[] = [];

  if (guess === assigned) {
    bonuses.push({ value: EXACT_MATCH_BONUS, reason: { kind: "exact_match" } });
  } else if (guess === reverseDigits(assigned)) {
    bonuses.push({ value: REVERSE_MATCH_BONUS, reason: { kind: "reverse_match" } });
  }

  for (const opponent of opponents) {
    if (opponent.assigned === guess) {
      bonuses.push({
        value: OTHER_MATCH_BONUS,
        reason: { kind: "other_match", player: opponent.player },
      });
    }
  }

  return bonuses;
}
