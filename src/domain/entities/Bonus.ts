import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { PlayerName } from "../typedefs.js";

export type BonusReason =
  | { readonly kind: "exact_match" }
  | { readonly kind: "reverse_match" }
  | { readonly kind: "other_match"; readonly player: PlayerName };

/** Extra points awarded on a round on top of the closeness score */
export interface Bonus {
  readonly value: number;
  readonly reason: BonusReason;
}

export const EXACT_MATCH_BONUS = 50;
export const REVERSE_MATCH_BONUS = 25;
export const OTHER_MATCH_BONUS = 25;

export function parseBonusReason(value: unknown): BonusReason | undefined {
  if (typeof value !== "object" || value === null || !("kind" in value)) {
    return undefined;
  }

  switch (value.kind) {
    case "exact_match":
      return { kind: "exact_match" };
    case "reverse_match":
      return { kind: "reverse_match" };
    case "other_match": {
      const player = "player" in value ? value.player : undefined;
      if (typeof player !== "string" || player.length === 0) return undefined;
      return { kind: "other_match", player };
    }
    default:
      return undefined;
  }
}

export function createBonus(value: number, reason: unknown): Bonus {
  const issues: string[] = [];

  if (!Number.isInteger(value) || value < 0) {
    issues.push("Bonus value must be a non-negative integer");
  }

  const parsed = parseBonusReason(reason);
  if (!parsed) {
    issues.push("Bonus reason must be exact_match, reverse_match or other_match");
  }

  if (!parsed || issues.length > 0) {
    throw new GameCommandInputError(issues);
  }

  return Object.freeze({ value, reason: Object.freeze(parsed) });
}
