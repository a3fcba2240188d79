import { EntityUnavailableError, type EntityKind } from "../errors/EntityUnavailableError.js";

/**
 * Request queue of a single actor. Handlers run one at a time in arrival
 * order; each starts only after the previous one has settled. Once stopped,
 * queued and future requests reject with {@link EntityUnavailableError}.
 */
export class Mailbox {
  #tail: Promise<void> = Promise.resolve();
  #stopped = false;
  #pending = 0;

  constructor(
    readonly entity: EntityKind,
    readonly key: string,
  ) {}

  get stopped(): boolean {
    return this.#stopped;
  }

  /** Requests queued or running. */
  get pending(): number {
    return this.#pending;
  }

  post<T>(handler: () => T | PromiseLike<T>): Promise<T> {
    if (this.#stopped) {
      return Promise.reject(new EntityUnavailableError(this.entity, this.key));
    }

    this.#pending += 1;
    const run = this.#tail
      .then(() => {
        if (this.#stopped) {
          throw new EntityUnavailableError(this.entity, this.key);
        }
        return handler();
      })
      .finally(() => {
        this.#pending -= 1;
      });

    // Callers see failures through `run`; the queue only waits for settlement.
    this.#tail = run.then(
      () => undefined,
      () => undefined,
    );

    return run;
  }

  stop(): void {
    this.#stopped = true;
  }
}
