import type { ServerContext } from "../../domain/commands/Command.js";
import type { Logger } from "../../domain/ports/Logger.js";
import type { MessageBus } from "../../domain/ports/MessageBus.js";
import { defaultRandom, type RandomSource } from "../../domain/random.js";
import type { TimePoint } from "../../domain/typedefs.js";
import { InMemoryGameRegistry } from "./InMemoryGameRegistry.js";
import { InMemoryMessageBus } from "./InMemoryMessageBus.js";
import { InMemoryPlayerRegistry } from "./InMemoryPlayerRegistry.js";

export interface ServerContextOptions {
  readonly random?: RandomSource;
  readonly now?: () => TimePoint;
  readonly logger?: Logger;
  readonly bus?: MessageBus;
}

/** A fresh, empty server: both registries and a bus living in this process. */
export function createServerContext(options: ServerContextOptions = {}): ServerContext {
  const { logger } = options;

  return {
    players: new InMemoryPlayerRegistry(),
    games: new InMemoryGameRegistry(),
    bus: options.bus ?? new InMemoryMessageBus(logger ? { logger } : {}),
    random: options.random ?? defaultRandom,
    now: options.now ?? Date.now,
    ...(logger ? { logger } : {}),
  };
}
