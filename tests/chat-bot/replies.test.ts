import { describe, expect, it } from "vitest";

import type { BotConfig } from "../../packages/chat-bot/src/config.js";
import {
  describeBonus,
  describeGameError,
  outcomeReply,
  renderReply,
  roundLine,
} from "../../packages/chat-bot/src/replies.js";
import { GAME_ERROR_KINDS } from "../../src/domain/errors/GameErrorKind.js";

const config: BotConfig = { prefix: "?", name: "Oracle", debug: false };

describe("replies", () => {
  it("has a sentence for every error kind", () => {
    for (const kind of GAME_ERROR_KINDS) {
      expect(describeGameError(kind, config)).not.toBe("");
    }
    expect(describeGameError("game_not_found", config)).toBe(
      "There is no game to join. Use `?host` to host one.",
    );
  });

  it("describes each bonus", () => {
    expect(describeBonus({ value: 25, reason: { kind: "other_match", player: "H" } })).toBe(
      "+ Guessed __H's__ number! `25` points!",
    );
    expect(describeBonus({ value: 50, reason: { kind: "exact_match" } })).toBe(
      "+ You Guessed Correctly! `50` points!",
    );
  });

  it("shows an open round with placeholders", () => {
    expect(roundLine("P", { round: 0, assigned: 12, bonuses: [] })).toBe(
      "__P__ => **0** (*assigned* `12`, _guessed_ `-`)",
    );
  });

  it("announces a tie", () => {
    const scored = { round: 0, assigned: 5, guess: 5, points: 150, bonuses: [] };
    const reply = outcomeReply(
      "P",
      scored,
      {
        type: "ended",
        round: 0,
        winners: ["H", "P"],
        scores: [
          { player: "H", round: scored, total: 150 },
          { player: "P", round: scored, total: 150 },
        ],
      },
      config,
    );

    expect(reply.description).toBe("It's a tie between __H__, __P__!");
  });

  it("renders a reply as plain text", () => {
    expect(
      renderReply({
        title: "Title",
        description: "Body",
        fields: [{ name: "Field", value: "Value" }],
        tone: "info",
      }),
    ).toBe("Title\nBody\n\nField:\nValue");
  });
});
