import type { EntityHandle, Registry, RegistryError } from "../../domain/ports/Registry.js";
import { fail, ok, type Result } from "../../domain/Result.js";

/**
 * Map-backed registry. Every method runs to completion without yielding
 * between its check and its write, which makes `register` a
 * compare-and-insert on a single event loop.
 */
export class InMemoryRegistry<THandle extends EntityHandle> implements Registry<THandle> {
  protected readonly entries = new Map<string, THandle>();

  async register(key: string, handle: THandle): Promise<Result<void, RegistryError>> {
    const existing = this.entries.get(key);
    if (existing?.alive) {
      return fail("name_taken");
    }

    // Re-inserting moves the key to the end of the iteration order.
    this.forget(key);
    this.entries.set(key, handle);
    return ok(undefined);
  }

  async lookup(key: string): Promise<Result<THandle, RegistryError>> {
    const handle = this.entries.get(key);
    if (!handle) {
      return fail("not_found");
    }
    if (!handle.alive) {
      this.forget(key);
      return fail("not_found");
    }
    return ok(handle);
  }

  async unregister(key: string): Promise<void> {
    this.forget(key);
  }

  async list(): Promise<readonly string[]> {
    return [...this.entries]
      .filter(([, handle]) => handle.alive)
      .map(([key]) => key);
  }

  async clear(): Promise<void> {
    for (const key of [...this.entries.keys()]) {
      this.entries.get(key)?.stop();
      this.forget(key);
    }
  }

  protected forget(key: string): void {
    this.entries.delete(key);
  }
}
