import type { PlayerActor } from "../actors/PlayerActor.js";
import type { Result } from "../Result.js";
import type { GameId, PlayerName } from "../typedefs.js";
import type { Registry, RegistryError } from "./Registry.js";

export type GameLookupError = RegistryError | "no_game";

export interface PlayerRegistry extends Registry<PlayerActor> {
  /** Records the game a registered player currently occupies. */
  assignGame(name: PlayerName, gameId: GameId): Promise<Result<void, RegistryError>>;

  /** `not_found` for unknown players, `no_game` for idle ones. */
  gameOf(name: PlayerName): Promise<Result<GameId, GameLookupError>>;

  /**
   * Clears the player's current game. With `gameId`, only when the player
   * still occupies that game.
   */
  leaveGame(name: PlayerName, gameId?: GameId): Promise<void>;
}
