import type { PlayerRound } from "../entities/PlayerRound.js";

export class InvalidRoundStateError extends Error {
  constructor(
    public readonly reason: string,
    public readonly round: PlayerRound | undefined,
  ) {
    super(`Invalid round state: ${reason}`);
    this.name = "InvalidRoundStateError";
  }
}
