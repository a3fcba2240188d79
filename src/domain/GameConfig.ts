export interface GameConfig {
  /** A round that leaves any player at or above this total ends the game */
  readonly maxPoints: number;
  /** Guesses and assigned numbers are drawn from 1..maxGuess */
  readonly maxGuess: number;
}

export type GameConfigOverrides = Partial<GameConfig>;

export const DEFAULT_MAX_POINTS = 300;
export const DEFAULT_MAX_GUESS = 100;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    maxPoints: overrides.maxPoints ?? DEFAULT_MAX_POINTS,
    maxGuess: overrides.maxGuess ?? DEFAULT_MAX_GUESS,
  };
}

export function validateGameConfig(config: GameConfig): readonly string[] {
  const issues: string[] = [];

  if (!isPositiveInteger(config.maxPoints)) {
    issues.push("maxPoints must be a positive integer");
  }

  if (!isPositiveInteger(config.maxGuess)) {
    issues.push("maxGuess must be a positive integer");
  }

  return issues;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
