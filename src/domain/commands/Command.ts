import type { GameRegistry } from "../ports/GameRegistry.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { PlayerRegistry } from "../ports/PlayerRegistry.js";
import type { RandomSource } from "../random.js";
import type { Result } from "../Result.js";
import type { TimePoint } from "../typedefs.js";

/**
 * Everything a command may touch. Built once per server and passed to every
 * entry point; nothing in the domain reaches for process-wide state.
 */
export interface ServerContext {
  readonly players: PlayerRegistry;
  readonly games: GameRegistry;
  readonly bus: MessageBus;
  readonly random: RandomSource;
  readonly now: () => TimePoint;
  readonly logger?: Logger;
}

export abstract class Command<TValue = void> {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: ServerContext): Promise<Result<TValue>>;
}
