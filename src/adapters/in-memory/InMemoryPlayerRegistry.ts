import type { PlayerActor } from "../../domain/actors/PlayerActor.js";
import type { GameLookupError, PlayerRegistry } from "../../domain/ports/PlayerRegistry.js";
import type { RegistryError } from "../../domain/ports/Registry.js";
import { fail, ok, type Result } from "../../domain/Result.js";
import type { GameId, PlayerName } from "../../domain/typedefs.js";
import { InMemoryRegistry } from "./InMemoryRegistry.js";

export class InMemoryPlayerRegistry
  extends InMemoryRegistry<PlayerActor>
  implements PlayerRegistry
{
  readonly #games = new Map<PlayerName, GameId>();

  async assignGame(name: PlayerName, gameId: GameId): Promise<Result<void, RegistryError>> {
    if (!this.entries.get(name)?.alive) {
      return fail("not_found");
    }
    this.#games.set(name, gameId);
    return ok(undefined);
  }

  async gameOf(name: PlayerName): Promise<Result<GameId, GameLookupError>> {
    if (!this.entries.get(name)?.alive) {
      return fail("not_found");
    }
    const gameId = this.#games.get(name);
    return gameId === undefined ? fail("no_game") : ok(gameId);
  }

  async leaveGame(name: PlayerName, gameId?: GameId): Promise<void> {
    if (gameId === undefined || this.#games.get(name) === gameId) {
      this.#games.delete(name);
    }
  }

  protected override forget(key: string): void {
    super.forget(key);
    this.#games.delete(key);
  }
}
