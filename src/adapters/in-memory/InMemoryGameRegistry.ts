import type { GameActor } from "../../domain/actors/GameActor.js";
import type { GameRegistry } from "../../domain/ports/GameRegistry.js";
import type { RegistryError } from "../../domain/ports/Registry.js";
import { fail, ok, type Result } from "../../domain/Result.js";
import type { GameId } from "../../domain/typedefs.js";
import { InMemoryRegistry } from "./InMemoryRegistry.js";

export class InMemoryGameRegistry extends InMemoryRegistry<GameActor> implements GameRegistry {
  #nextId = 1;

  nextId(): GameId {
    return `game-${this.#nextId++}`;
  }

  async latest(): Promise<Result<GameActor, RegistryError>> {
    const live = [...this.entries.values()].filter((game) => game.alive);
    const newest = live[live.length - 1];
    return newest ? ok(newest) : fail("not_found");
  }
}
