import type { Logger } from "../../domain/ports/Logger.js";
import type { MessageBus } from "../../domain/ports/MessageBus.js";

export interface PublishedEvent<TEvent extends object = object> {
  readonly channel: string;
  readonly event: TEvent;
}

export type EventListener = (payload: PublishedEvent) => void | Promise<void>;

export interface InMemoryMessageBusOptions {
  readonly logger?: Logger;
  /** How many published events `events` keeps; oldest dropped first. */
  readonly historyLimit?: number;
}

/** Channel name that receives every event regardless of its channel */
export const ALL_CHANNELS = "*";

export class InMemoryMessageBus implements MessageBus {
  readonly #listeners = new Map<string, Set<EventListener>>();
  readonly #history: PublishedEvent[] = [];
  readonly #historyLimit: number;
  readonly #logger: Logger | undefined;

  constructor(options: InMemoryMessageBusOptions = {}) {
    this.#historyLimit = options.historyLimit ?? 100;
    this.#logger = options.logger;
  }

  get events(): readonly PublishedEvent[] {
    return [...this.#history];
  }

  async publish(channel: string, event: object): Promise<void> {
    const payload: PublishedEvent = { channel, event };

    this.#history.push(payload);
    if (this.#history.length > this.#historyLimit) {
      this.#history.splice(0, this.#history.length - this.#historyLimit);
    }

    const listeners = [
      ...(this.#listeners.get(channel) ?? []),
      ...(channel === ALL_CHANNELS ? [] : (this.#listeners.get(ALL_CHANNELS) ?? [])),
    ];

    for (const listener of listeners) {
      try {
        await listener(payload);
      } catch (error) {
        this.#logger?.warn?.("Event listener failed", { channel, error });
      }
    }
  }

  subscribe(channel: string, listener: EventListener): () => void {
    const listeners = this.#listeners.get(channel) ?? new Set<EventListener>();
    listeners.add(listener);
    this.#listeners.set(channel, listeners);

    return () => {
      listeners.delete(listener);
      if (listeners.size === 0) {
        this.#listeners.delete(channel);
      }
    };
  }
}
