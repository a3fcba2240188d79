import type { Bonus } from "../entities/Bonus.js";
import {
  addCurrentRoundBonus,
  assertValidPlayerState,
  closeCurrentRound,
  createPlayerState,
  currentRound,
  ensureCurrentRoundClosed,
  guessCurrentRound,
  resetPlayer,
  startRound,
  sumClosedPoints,
  type PlayerState,
} from "../entities/PlayerLedger.js";
import type { PlayerRound } from "../entities/PlayerRound.js";
import { InvalidPlayerStateError } from "../errors/InvalidPlayerStateError.js";
import type { Logger } from "../ports/Logger.js";
import type { EntityHandle } from "../ports/Registry.js";
import type { PlayerName, RoundNumber } from "../typedefs.js";
import { Mailbox } from "./Mailbox.js";

export interface PlayerActorOptions {
  readonly logger?: Logger;
}

/**
 * Owns one player's ledger. Every method goes through the player's mailbox,
 * so concurrent callers never interleave inside a mutation.
 */
export class PlayerActor implements EntityHandle {
  #state: PlayerState;
  readonly #mailbox: Mailbox;
  readonly #logger: Logger | undefined;

  constructor(
    readonly name: PlayerName,
    options: PlayerActorOptions = {},
  ) {
    this.#state = createPlayerState(name);
    this.#mailbox = new Mailbox("player", name);
    this.#logger = options.logger;
  }

  get alive(): boolean {
    return !this.#mailbox.stopped;
  }

  stop(): void {
    this.#mailbox.stop();
  }

  info(): Promise<PlayerState> {
    return this.#mailbox.post(() => this.#state);
  }

  /** Recomputed from the closed rounds on every call. */
  totalPoints(): Promise<number> {
    return this.#mailbox.post(() => sumClosedPoints(this.#state.rounds));
  }

  currentRound(): Promise<PlayerRound | undefined> {
    return this.#mailbox.post(() => currentRound(this.#state));
  }

  startRound(round: RoundNumber, assigned: number): Promise<PlayerRound> {
    return this.#mailbox.post(() =>
      this.#roundOf(this.#apply(startRound(this.#state, round, assigned))),
    );
  }

  recordGuess(guess: number): Promise<PlayerRound> {
    return this.#mailbox.post(() =>
      this.#roundOf(this.#apply(guessCurrentRound(this.#state, guess))),
    );
  }

  addBonus(bonus: Bonus): Promise<PlayerRound> {
    return this.#mailbox.post(() =>
      this.#roundOf(this.#apply(addCurrentRoundBonus(this.#state, bonus))),
    );
  }

  closeRound(): Promise<PlayerRound> {
    return this.#mailbox.post(() => {
      const round = this.#roundOf(this.#apply(closeCurrentRound(this.#state)));
      this.#logger?.debug?.("Round closed", {
        player: this.name,
        round: round.round,
        points: round.points,
        total: this.#state.points,
      });
      return round;
    });
  }

  ensureRoundClosed(): Promise<PlayerRound | undefined> {
    return this.#mailbox.post(() =>
      currentRound(this.#apply(ensureCurrentRoundClosed(this.#state))),
    );
  }

  reset(): Promise<void> {
    return this.#mailbox.post(() => {
      this.#apply(resetPlayer(this.#state));
    });
  }

  #apply(next: PlayerState): PlayerState {
    assertValidPlayerState(next);
    this.#state = next;
    return next;
  }

  #roundOf(state: PlayerState): PlayerRound {
    const round = currentRound(state);
    if (!round) {
      throw new InvalidPlayerStateError("no round in progress", state);
    }
    return round;
  }
}
