import type { PlayerState } from "../entities/PlayerLedger.js";

export class InvalidPlayerStateError extends Error {
  constructor(
    public readonly reason: string,
    public readonly state: PlayerState,
  ) {
    super(`Invalid player state for ${state.name}: ${reason}`);
    this.name = "InvalidPlayerStateError";
  }
}
