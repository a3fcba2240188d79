/**
 * Malformed caller input, caught while a command or value is being built and
 * before any entity is touched. The message lists every issue, so adapters
 * can show it to players as is.
 */
export class GameCommandInputError extends Error {
  override readonly name = "GameCommandInputError";

  constructor(public readonly issues: readonly string[]) {
    super(issues.length > 0 ? issues.join("; ") : "Malformed command input");
  }

  /** Throws when any issue was found. */
  static assertNone(issues: readonly string[]): void {
    if (issues.length > 0) {
      throw new GameCommandInputError(issues);
    }
  }
}
