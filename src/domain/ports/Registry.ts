import type { Result } from "../Result.js";

export type RegistryError = "name_taken" | "not_found";

/** Anything a registry can hand out: a live actor that can be torn down. */
export interface EntityHandle {
  readonly alive: boolean;
  stop(): void;
}

/**
 * Unique-key mapping from a name to a live handle.
 * Implementations must make `register` a compare-and-insert: two concurrent
 * registrations of the same key can never both succeed.
 */
export interface Registry<THandle extends EntityHandle> {
  /** Fails with `name_taken` while the key is bound to a live handle. */
  register(key: string, handle: THandle): Promise<Result<void, RegistryError>>;

  /** Stopped handles count as absent. */
  lookup(key: string): Promise<Result<THandle, RegistryError>>;

  /** No-op when the key is not registered. */
  unregister(key: string): Promise<void>;

  /** Snapshot of the keys bound to live handles, in no particular order. */
  list(): Promise<readonly string[]>;

  /** Stops every handle and forgets every key. */
  clear(): Promise<void>;
}
