import { describe, expect, it } from "vitest";

import { InMemoryGameRegistry } from "../src/adapters/in-memory/InMemoryGameRegistry.js";
import { InMemoryPlayerRegistry } from "../src/adapters/in-memory/InMemoryPlayerRegistry.js";
import { GameActor } from "../src/domain/actors/GameActor.js";
import { PlayerActor } from "../src/domain/actors/PlayerActor.js";
import { scriptedRandom } from "./support/mocks.js";

describe("InMemoryPlayerRegistry", () => {
  it("refuses a name bound to a live player", async () => {
    const registry = new InMemoryPlayerRegistry();

    expect(await registry.register("P", new PlayerActor("P"))).toEqual({ ok: true, value: undefined });
    expect(await registry.register("P", new PlayerActor("P"))).toEqual({
      ok: false,
      error: "name_taken",
    });
  });

  it("lets only one of two concurrent registrations win", async () => {
    const registry = new InMemoryPlayerRegistry();
    const results = await Promise.all([
      registry.register("P", new PlayerActor("P")),
      registry.register("P", new PlayerActor("P")),
    ]);

    expect(results.filter((result) => result.ok)).toHaveLength(1);
  });

  it("treats stopped players as absent and replaces them", async () => {
    const registry = new InMemoryPlayerRegistry();
    const first = new PlayerActor("P");
    await registry.register("P", first);
    await registry.assignGame("P", "game-1");

    first.stop();
    expect(await registry.lookup("P")).toEqual({ ok: false, error: "not_found" });
    expect(await registry.list()).toEqual([]);

    const second = new PlayerActor("P");
    expect((await registry.register("P", second)).ok).toBe(true);
    expect(await registry.lookup("P")).toEqual({ ok: true, value: second });
    expect(await registry.gameOf("P")).toEqual({ ok: false, error: "no_game" });
  });

  it("tracks the current game of each player", async () => {
    const registry = new InMemoryPlayerRegistry();
    await registry.register("P", new PlayerActor("P"));

    expect(await registry.gameOf("Z")).toEqual({ ok: false, error: "not_found" });
    expect(await registry.gameOf("P")).toEqual({ ok: false, error: "no_game" });
    expect(await registry.assignGame("Z", "game-1")).toEqual({ ok: false, error: "not_found" });

    await registry.assignGame("P", "game-1");
    expect(await registry.gameOf("P")).toEqual({ ok: true, value: "game-1" });

    await registry.leaveGame("P", "game-2");
    expect(await registry.gameOf("P")).toEqual({ ok: true, value: "game-1" });

    await registry.leaveGame("P", "game-1");
    expect(await registry.gameOf("P")).toEqual({ ok: false, error: "no_game" });
  });

  it("stops every player on clear", async () => {
    const registry = new InMemoryPlayerRegistry();
    const actor = new PlayerActor("P");
    await registry.register("P", actor);
    await registry.unregister("missing");

    await registry.clear();
    expect(actor.alive).toBe(false);
    expect(await registry.list()).toEqual([]);
    await registry.clear();
  });
});

describe("InMemoryGameRegistry", () => {
  const players = new InMemoryPlayerRegistry();
  const game = (id: string, host: string): GameActor =>
    new GameActor({ id, host, players, random: scriptedRandom([1]) });

  it("allocates sequential identifiers", () => {
    const registry = new InMemoryGameRegistry();
    expect([registry.nextId(), registry.nextId()]).toEqual(["game-1", "game-2"]);
  });

  it("returns the most recently registered live game", async () => {
    const registry = new InMemoryGameRegistry();
    expect(await registry.latest()).toEqual({ ok: false, error: "not_found" });

    const first = game("game-1", "A");
    const second = game("game-2", "B");
    await registry.register(first.id, first);
    await registry.register(second.id, second);
    expect(await registry.latest()).toEqual({ ok: true, value: second });

    second.stop();
    expect(await registry.latest()).toEqual({ ok: true, value: first });
  });
});
