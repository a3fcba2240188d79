import { describe, expect, it } from "vitest";

import { parseChatCommand } from "../../packages/chat-bot/src/commands.js";

describe("parseChatCommand", () => {
  it("ignores lines without the prefix", () => {
    expect(parseChatCommand("hello there", "!")).toBeUndefined();
    expect(parseChatCommand("play 42", "!")).toBeUndefined();
  });

  it("reads bare commands case-insensitively", () => {
    expect(parseChatCommand("!start", "!")).toEqual({ kind: "start" });
    expect(parseChatCommand("  !PLAYERS  ", "!")).toEqual({ kind: "players" });
    expect(parseChatCommand("!help", "!")).toEqual({ kind: "help" });
    expect(parseChatCommand("!leave", "!")).toEqual({ kind: "leave" });
  });

  it("reads an optional game name for host", () => {
    expect(parseChatCommand("!host", "!")).toEqual({ kind: "host" });
    expect(parseChatCommand("!host Friday   night", "!")).toEqual({
      kind: "host",
      gameName: "Friday night",
    });
  });

  it("reads every join form", () => {
    expect(parseChatCommand("!join", "!")).toEqual({ kind: "join" });
    expect(parseChatCommand("!join Nick", "!")).toEqual({ kind: "join", nickname: "Nick" });
    expect(parseChatCommand("!join player Ann", "!")).toEqual({ kind: "join", player: "Ann" });
    expect(parseChatCommand("!join Nick player Ann", "!")).toEqual({
      kind: "join",
      nickname: "Nick",
      player: "Ann",
    });
    expect(parseChatCommand("!join a b", "!")).toEqual({ kind: "usage", command: "join" });
  });

  it("reads config parameters", () => {
    expect(parseChatCommand("!config max_points 50", "!")).toEqual({
      kind: "config",
      param: "max_points",
      value: "50",
    });
    expect(parseChatCommand("!config max_points", "!")).toEqual({
      kind: "usage",
      command: "config",
    });
  });

  it("reads guesses with an optional nickname", () => {
    expect(parseChatCommand("!play 42", "!")).toEqual({ kind: "play", guess: 42 });
    expect(parseChatCommand("!play Nick 7", "!")).toEqual({
      kind: "play",
      nickname: "Nick",
      guess: 7,
    });
    expect(parseChatCommand("!play lots", "!")).toEqual({ kind: "usage", command: "play" });
    expect(parseChatCommand("!play", "!")).toEqual({ kind: "usage", command: "play" });
  });

  it("reports unknown commands", () => {
    expect(parseChatCommand("!dance", "!")).toEqual({ kind: "unknown", name: "dance" });
    expect(parseChatCommand("!", "!")).toEqual({ kind: "unknown", name: "" });
  });

  it("honours a custom prefix", () => {
    expect(parseChatCommand("gg:start", "gg:")).toEqual({ kind: "start" });
    expect(parseChatCommand("!start", "gg:")).toBeUndefined();
  });
});
