import type { GameErrorKind } from "./errors/GameErrorKind.js";

/**
 * Outcome of a domain operation. Expected failures travel as values; only
 * malformed input, broken invariants and unavailable actors are thrown.
 */
export type Result<T, E = GameErrorKind> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
