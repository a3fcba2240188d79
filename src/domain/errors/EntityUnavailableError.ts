export type EntityKind = "player" | "game";

/**
 * Raised when an actor was stopped, or could not be found, while a request
 * for it was in flight. Never folded into the domain error kinds.
 */
export class EntityUnavailableError extends Error {
  constructor(
    public readonly entity: EntityKind,
    public readonly key: string,
  ) {
    super(`${entity === "player" ? "Player" : "Game"} ${key} is unavailable`);
    this.name = "EntityUnavailableError";
  }
}
