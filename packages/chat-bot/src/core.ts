export { createServerContext } from "@number-guesser/core/adapters/in-memory/createServerContext.js";
export type { ServerContextOptions } from "@number-guesser/core/adapters/in-memory/createServerContext.js";
export type {
  GameSnapshot,
  NextTurn,
  PlayedTurn,
  PlayerScore,
  TurnOutcome,
} from "@number-guesser/core/domain/actors/GameActor.js";
export type { ServerContext } from "@number-guesser/core/domain/commands/Command.js";
export type { ServerSummary } from "@number-guesser/core/domain/commands/queries.js";
export type { Bonus, BonusReason } from "@number-guesser/core/domain/entities/Bonus.js";
export type { PlayerRound } from "@number-guesser/core/domain/entities/PlayerRound.js";
export {
  EntityUnavailableError,
  GameCommandInputError,
  type GameErrorKind,
} from "@number-guesser/core/domain/errors/index.js";
export * as facade from "@number-guesser/core/domain/facade.js";
export type { GameConfig, GameConfigOverrides } from "@number-guesser/core/domain/GameConfig.js";
export type { Logger } from "@number-guesser/core/domain/ports/Logger.js";
export type { Result } from "@number-guesser/core/domain/Result.js";
export type { PlayerName } from "@number-guesser/core/domain/typedefs.js";
