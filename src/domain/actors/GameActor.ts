import {
  addPlayer,
  advanceRound,
  advanceTurn,
  assertValidGameState,
  beginSession,
  checkPlay,
  configure,
  createGameState,
  currentActor,
  finishSession,
  isLastTurn,
  reachedMaxPoints,
  removePlayer,
  requireCurrentActor,
  restartSession,
  roleOf,
  summarizeGame,
  type GameState,
} from "../entities/GameRules.js";
import type { PlayerRound } from "../entities/PlayerRound.js";
import { computeBonuses, type OpponentAssignment } from "../entities/ScoringRules.js";
import { EntityUnavailableError } from "../errors/EntityUnavailableError.js";
import type { GameConfig } from "../GameConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { PlayerRegistry } from "../ports/PlayerRegistry.js";
import type { EntityHandle } from "../ports/Registry.js";
import { drawAssignedNumber, type RandomSource } from "../random.js";
import { fail, ok, type Result } from "../Result.js";
import type { GameId, GameRole, PlayerName, RoundNumber } from "../typedefs.js";
import type { PlayerActor } from "./PlayerActor.js";
import { Mailbox } from "./Mailbox.js";

export interface GameSnapshot extends GameState {
  readonly currentPlayer: PlayerName | undefined;
  readonly summary: string;
}

/** A roster member's standing once a round has been scored */
export interface PlayerScore {
  readonly player: PlayerName;
  readonly round: PlayerRound | undefined;
  readonly total: number;
}

export type TurnOutcome =
  | {
      readonly type: "next_turn";
      readonly round: RoundNumber;
      readonly turn: number;
      readonly player: PlayerName;
    }
  | {
      readonly type: "next_round";
      readonly round: RoundNumber;
      readonly turn: number;
      readonly player: PlayerName;
      /** Standings at the close of the previous round */
      readonly scores: readonly PlayerScore[];
    }
  | {
      readonly type: "ended";
      readonly round: RoundNumber;
      readonly scores: readonly PlayerScore[];
      readonly winners: readonly PlayerName[];
    };

export type NextTurn = Extract<TurnOutcome, { readonly type: "next_turn" }>;

export interface PlayedTurn {
  /** The acting player's round, closed */
  readonly scored: PlayerRound;
  readonly outcome: TurnOutcome;
}

export interface GameActorOptions {
  readonly id: GameId;
  readonly host: PlayerName;
  readonly name?: string;
  readonly config?: GameConfig;
  readonly players: PlayerRegistry;
  readonly random: RandomSource;
  readonly logger?: Logger;
}

/**
 * Turn-based state machine of one game session. Requests are serialized by
 * the game's mailbox; while handling one, the game calls into player actors,
 * which never call back into a game.
 */
export class GameActor implements EntityHandle {
  #state: GameState;
  readonly #mailbox: Mailbox;
  readonly #players: PlayerRegistry;
  readonly #random: RandomSource;
  readonly #logger: Logger | undefined;

  constructor(options: GameActorOptions) {
    this.#state = createGameState(options.id, options.host, options.name, options.config);
    assertValidGameState(this.#state);
    this.#mailbox = new Mailbox("game", options.id);
    this.#players = options.players;
    this.#random = options.random;
    this.#logger = options.logger;
  }

  get id(): GameId {
    return this.#state.id;
  }

  get host(): PlayerName {
    return this.#state.host;
  }

  get alive(): boolean {
    return !this.#mailbox.stopped;
  }

  stop(): void {
    this.#mailbox.stop();
  }

  info(): Promise<GameSnapshot> {
    return this.#mailbox.post(() => ({
      ...this.#state,
      currentPlayer: currentActor(this.#state),
      summary: summarizeGame(this.#state),
    }));
  }

  role(player: PlayerName): Promise<Result<GameRole>> {
    return this.#mailbox.post(() => {
      const role = roleOf(this.#state, player);
      return role ? ok(role) : fail("player_not_found");
    });
  }

  addPlayer(player: PlayerName): Promise<Result<readonly PlayerName[]>> {
    return this.#mailbox.post(() => {
      const next = addPlayer(this.#state, player);
      if (!next.ok) return next;
      return ok(this.#commit(next.value).players);
    });
  }

  removePlayer(player: PlayerName): Promise<Result<readonly PlayerName[]>> {
    return this.#mailbox.post(() => {
      const next = removePlayer(this.#state, player);
      if (!next.ok) return next;
      return ok(this.#commit(next.value).players);
    });
  }

  configure(config: GameConfig): Promise<Result<GameConfig>> {
    return this.#mailbox.post(() => {
      const next = configure(this.#state, config);
      if (!next.ok) return next;
      return ok(this.#commit(next.value).config);
    });
  }

  start(caller: PlayerName): Promise<Result<NextTurn>> {
    return this.#mailbox.post(async () => {
      const next = beginSession(this.#state, caller);
      if (!next.ok) return next;

      await this.#dealRound(next.value);
      return ok(nextTurnOf(this.#commit(next.value)));
    });
  }

  restart(caller: PlayerName): Promise<Result<NextTurn>> {
    return this.#mailbox.post(async () => {
      const next = restartSession(this.#state, caller);
      if (!next.ok) return next;

      const actors = await this.#actors(next.value.turnOrder);
      await Promise.all(actors.map((actor) => actor.reset()));
      await this.#dealRound(next.value);
      return ok(nextTurnOf(this.#commit(next.value)));
    });
  }

  play(player: PlayerName, guess: number): Promise<Result<PlayedTurn>> {
    return this.#mailbox.post(async () => {
      const checked = checkPlay(this.#state, player, guess);
      if (!checked.ok) return checked;

      const state = this.#state;
      const actor = await this.#actor(player);
      const opponents = await this.#opponents(state, player);

      const guessed = await actor.recordGuess(guess);
      for (const bonus of computeBonuses(guessed.assigned, guess, opponents)) {
        await actor.addBonus(bonus);
      }
      const scored = await actor.closeRound();

      if (!isLastTurn(state)) {
        return ok({ scored, outcome: nextTurnOf(this.#commit(advanceTurn(state))) });
      }

      const scores = await this.#closeRoundForAll(state);

      if (reachedMaxPoints(state.config, scores.map((score) => score.total))) {
        this.#commit(finishSession(state));
        const ended: TurnOutcome = {
          type: "ended",
          round: state.round,
          scores,
          winners: winnersOf(scores),
        };
        return ok({ scored, outcome: ended });
      }

      const next = advanceRound(state);
      await this.#dealRound(next);
      this.#commit(next);
      const nextRound: TurnOutcome = {
        type: "next_round",
        round: next.round,
        turn: next.turn,
        player: requireCurrentActor(next),
        scores,
      };
      return ok({ scored, outcome: nextRound });
    });
  }

  async #dealRound(state: GameState): Promise<void> {
    const actors = await this.#actors(state.turnOrder);
    const assignments = actors.map(
      (actor) => [actor, drawAssignedNumber(this.#random, state.config.maxGuess)] as const,
    );
    await Promise.all(
      assignments.map(([actor, assigned]) => actor.startRound(state.round, assigned)),
    );
  }

  async #closeRoundForAll(state: GameState): Promise<PlayerScore[]> {
    const actors = await this.#actors(state.turnOrder);
    return Promise.all(
      actors.map(async (actor) => {
        const round = await actor.ensureRoundClosed();
        const total = await actor.totalPoints();
        return { player: actor.name, round, total };
      }),
    );
  }

  async #opponents(state: GameState, player: PlayerName): Promise<OpponentAssignment[]> {
    const others = await this.#actors(state.turnOrder.filter((name) => name !== player));
    const rounds = await Promise.all(others.map((other) => other.currentRound()));

    return others.flatMap((other, index) => {
      const round = rounds[index];
      return round ? [{ player: other.name, assigned: round.assigned }] : [];
    });
  }

  #actors(names: readonly PlayerName[]): Promise<PlayerActor[]> {
    return Promise.all(names.map((name) => this.#actor(name)));
  }

  async #actor(name: PlayerName): Promise<PlayerActor> {
    const found = await this.#players.lookup(name);
    if (!found.ok) {
      throw new EntityUnavailableError("player", name);
    }
    return found.value;
  }

  #commit(next: GameState): GameState {
    assertValidGameState(next);
    this.#state = next;
    this.#logger?.debug?.("Game state updated", {
      gameId: next.id,
      status: next.status,
      round: next.round,
      turn: next.turn,
    });
    return next;
  }
}

function nextTurnOf(state: GameState): NextTurn {
  return {
    type: "next_turn",
    round: state.round,
    turn: state.turn,
    player: requireCurrentActor(state),
  };
}

function winnersOf(scores: readonly PlayerScore[]): PlayerName[] {
  const best = Math.max(...scores.map((score) => score.total));
  return scores.filter((score) => score.total === best).map((score) => score.player);
}
