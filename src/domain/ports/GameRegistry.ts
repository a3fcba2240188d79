import type { GameActor } from "../actors/GameActor.js";
import type { Result } from "../Result.js";
import type { GameId } from "../typedefs.js";
import type { Registry, RegistryError } from "./Registry.js";

export interface GameRegistry extends Registry<GameActor> {
  /** Allocates an identifier no other game on this registry has used. */
  nextId(): GameId;

  /** The most recently registered game that is still live. */
  latest(): Promise<Result<GameActor, RegistryError>>;
}
