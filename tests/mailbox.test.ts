import { describe, expect, it } from "vitest";

import { Mailbox } from "../src/domain/actors/Mailbox.js";
import { EntityUnavailableError } from "../src/domain/errors/EntityUnavailableError.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("Mailbox", () => {
  it("runs handlers one at a time in arrival order", async () => {
    const mailbox = new Mailbox("game", "game-1");
    const gate = deferred();
    const log: string[] = [];

    const first = mailbox.post(async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
      return 1;
    });
    const second = mailbox.post(() => {
      log.push("second");
      return 2;
    });

    expect(mailbox.pending).toBe(2);
    gate.resolve();

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(log).toEqual(["first:start", "first:end", "second"]);
    expect(mailbox.pending).toBe(0);
  });

  it("keeps serving after a handler throws", async () => {
    const mailbox = new Mailbox("player", "P");

    const failing = mailbox.post(() => {
      throw new Error("boom");
    });
    const next = mailbox.post(() => "still here");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("still here");
  });

  it("rejects queued and future requests once stopped", async () => {
    const mailbox = new Mailbox("player", "P");
    const gate = deferred();

    const running = mailbox.post(() => gate.promise);
    const queued = expect(mailbox.post(() => "never")).rejects.toBeInstanceOf(
      EntityUnavailableError,
    );
    mailbox.stop();
    gate.resolve();

    await expect(running).resolves.toBeUndefined();
    await queued;
    await expect(mailbox.post(() => "late")).rejects.toThrow("Player P is unavailable");
    expect(mailbox.stopped).toBe(true);
  });
});
