import { describe, expect, it } from "vitest";

import { createBonus, parseBonusReason } from "../../src/domain/entities/Bonus.js";
import { GameCommandInputError } from "../../src/domain/errors/GameCommandInputError.js";

describe("parseBonusReason", () => {
  it("accepts the known reasons", () => {
    expect(parseBonusReason({ kind: "exact_match" })).toEqual({ kind: "exact_match" });
    expect(parseBonusReason({ kind: "reverse_match" })).toEqual({ kind: "reverse_match" });
    expect(parseBonusReason({ kind: "other_match", player: "H" })).toEqual({
      kind: "other_match",
      player: "H",
    });
  });

  it("rejects unknown or incomplete reasons", () => {
    expect(parseBonusReason({ kind: "lucky_guess" })).toBeUndefined();
    expect(parseBonusReason({ kind: "other_match" })).toBeUndefined();
    expect(parseBonusReason("exact_match")).toBeUndefined();
    expect(parseBonusReason(null)).toBeUndefined();
  });
});

describe("createBonus", () => {
  it("returns a frozen bonus", () => {
    const bonus = createBonus(25, { kind: "reverse_match" });
    expect(bonus).toEqual({ value: 25, reason: { kind: "reverse_match" } });
    expect(Object.isFrozen(bonus)).toBe(true);
  });

  it("throws on an unknown reason", () => {
    expect(() => createBonus(25, { kind: "lucky_guess" })).toThrow(GameCommandInputError);
    expect(() => createBonus(25, { kind: "lucky_guess" })).toThrow(
      "Bonus reason must be exact_match, reverse_match or other_match",
    );
  });

  it("throws on a negative value", () => {
    expect(() => createBonus(-5, { kind: "exact_match" })).toThrow(
      "Bonus value must be a non-negative integer",
    );
  });
});
