import { describe, expect, it } from "vitest";

import { ChatBot } from "../../packages/chat-bot/src/ChatBot.js";
import type { BotConfig } from "../../packages/chat-bot/src/config.js";
import { createServerContext } from "../../src/adapters/in-memory/createServerContext.js";
import { gameInfo } from "../../src/domain/facade.js";
import {
  createLoggerMock,
  createTestServer,
  expectOk,
  type TestServerOptions,
} from "../support/mocks.js";

const config: BotConfig = { prefix: "!", name: "GG.Bot", debug: false };

function createBot(options: TestServerOptions = {}) {
  const server = createTestServer(options);
  const bot = new ChatBot({ ctx: server.ctx, config, logger: server.logger });
  return { ...server, bot };
}

const error = (description: string) => ({
  title: "GG.Bot Error!",
  description,
  fields: [],
  tone: "error",
});

describe("ChatBot", () => {
  it("ignores ordinary chatter", async () => {
    const { bot } = createBot();
    expect(await bot.handle("H", "good luck everyone")).toBeUndefined();
  });

  it("hosts and joins games", async () => {
    const { bot } = createBot();

    expect(await bot.handle("H", "!host")).toEqual({
      title: "GG.Bot - New Game Hosted",
      description: "A new game has been hosted by H.\nUse `!join` to join the game.",
      fields: [],
      tone: "info",
    });
    expect(await bot.handle("P", "!join")).toEqual({
      title: "GG.Bot - Joined game",
      description: "P has joined H's game.\nH can use `!start` to start the game.",
      fields: [],
      tone: "info",
    });
    expect(await bot.handle("P", "!join")).toEqual(error("This player is already in a game."));
  });

  it("plays rounds and reports bonuses", async () => {
    const { bot } = createBot({ numbers: [47, 10] });
    await bot.handle("H", "!host");
    await bot.handle("P", "!join");

    expect(await bot.handle("H", "!start")).toEqual({
      title: "Game started!",
      description: "Round 1, __H's__ turn.\nUse `!play <number>` to guess your assigned number",
      fields: [],
      tone: "info",
    });

    expect(await bot.handle("H", "!play 74")).toEqual({
      title: "Next turn",
      description: "Round 1, __P's__ turn.\nUse `!play <number>` to guess your assigned number",
      fields: [
        {
          name: "Your guess",
          value:
            "__H__ => **98** (*assigned* `47`, _guessed_ `74`)\n" +
            "+ Oooh, Inverse Match - Nice! `25` points!",
        },
      ],
      tone: "info",
    });

    expect(await bot.handle("P", "!play 10")).toEqual({
      title: "New Round!",
      description: "Round 2, __H's__ turn.\nUse `!play <number>` to guess your assigned number",
      fields: [
        {
          name: "Previous round",
          value:
            "__H__ => **98** (*assigned* `47`, _guessed_ `74`)\n" +
            "+ Oooh, Inverse Match - Nice! `25` points!\n" +
            "__P__ => **150** (*assigned* `10`, _guessed_ `10`)\n" +
            "+ You Guessed Correctly! `50` points!",
        },
        { name: "Total so far", value: "__H__ => **98**\n__P__ => **150**" },
      ],
      tone: "info",
    });
  });

  it("announces the winner when the game ends", async () => {
    const { bot } = createBot({ numbers: [10, 20] });
    await bot.handle("H", "!host");
    await bot.handle("P", "!join");
    await bot.handle("H", "!config max_points 50");
    await bot.handle("H", "!start");
    await bot.handle("H", "!play 10");

    const reply = await bot.handle("P", "!play 25");

    expect(reply?.title).toBe("Game Over!");
    expect(reply?.description).toBe("Everyone wins! Just kidding...\n\n__H__ wins!!");
    expect(reply?.fields[1]).toEqual({
      name: "Final score",
      value: "__H__ => **150**\n__P__ => **95**",
    });
    expect(await bot.handle("H", "!play 5")).toEqual(
      error("This action cannot be performed during this stage of the game."),
    );
  });

  it("changes one configuration parameter at a time", async () => {
    const { bot, ctx } = createBot();
    await bot.handle("H", "!host");

    expect(await bot.handle("H", "!config max_guess 20")).toEqual({
      title: "Configuration updated",
      description: "Parameter __max_guess__ is now set to `20`",
      fields: [{ name: "Configuration", value: "max_points `300`, max_guess `20`" }],
      tone: "info",
    });
    await bot.handle("H", "!config max_points 50");

    expect(expectOk(await gameInfo(ctx, "H")).config).toEqual({ maxPoints: 50, maxGuess: 20 });
  });

  it("explains bad configuration requests", async () => {
    const { bot } = createBot();
    await bot.handle("H", "!host");

    expect(await bot.handle("H", "!config colour 5")).toEqual(
      error("__colour__ is not a valid configuration parameter"),
    );
    expect(await bot.handle("H", "!config max_points abc")).toEqual(
      error("maxPoints must be a positive integer"),
    );
    expect(await bot.handle("P", "!config max_points 50")).toEqual(
      error("This player is not on the game server."),
    );
  });

  it("acts for a nickname instead of the author", async () => {
    const { bot } = createBot({ numbers: [5, 6] });
    await bot.handle("H", "!host");

    expect((await bot.handle("someone", "!join Nick"))?.description).toBe(
      "Nick has joined H's game.\nH can use `!start` to start the game.",
    );
    await bot.handle("H", "!start");
    await bot.handle("H", "!play 50");

    const reply = await bot.handle("someone", "!play Nick 6");
    expect(reply?.title).toBe("New Round!");
  });

  it("joins the game of a named player", async () => {
    const { bot } = createBot();
    await bot.handle("A", "!host");
    await bot.handle("B", "!host");

    expect((await bot.handle("C", "!join player A"))?.description).toBe(
      "C has joined A's game.\nA can use `!start` to start the game.",
    );
  });

  it("maps domain failures to sentences", async () => {
    const { bot } = createBot();

    expect(await bot.handle("P", "!join")).toEqual(
      error("There is no game to join. Use `!host` to host one."),
    );
    await bot.handle("H", "!host");
    expect(await bot.handle("Z", "!start")).toEqual(error("This player is not on the game server."));
    await bot.handle("P", "!join");
    expect(await bot.handle("P", "!start")).toEqual(
      error("This action can only be performed by the game host."),
    );
    await bot.handle("H", "!start");
    expect(await bot.handle("P", "!play 5")).toEqual(error("It is not your turn."));
    expect(await bot.handle("H", "!play 500")).toEqual(
      error("That guess is outside the range of numbers in play."),
    );
  });

  it("answers unknown and malformed commands", async () => {
    const { bot } = createBot();

    expect(await bot.handle("H", "!dance")).toEqual(
      error("Unknown command `!dance`. Use `!help` to list the commands."),
    );
    expect(await bot.handle("H", "!play lots")).toEqual(error("Usage: `!play [nickname] <guess>`"));
  });

  it("lists players and describes the game", async () => {
    const { bot } = createBot();
    expect((await bot.handle("H", "!players"))?.description).toBe("No players are connected.");

    await bot.handle("H", "!host");
    await bot.handle("P", "!join");

    expect((await bot.handle("H", "!players"))?.description).toBe("H\nP");
    expect(await bot.handle("P", "!info")).toEqual({
      title: "H",
      description: "H's game: Setting up",
      fields: [
        { name: "Players", value: "H\nP" },
        { name: "Configuration", value: "max_points `300`, max_guess `100`" },
      ],
      tone: "info",
    });
  });

  it("lets guests leave and hosts end their game", async () => {
    const { bot } = createBot();
    await bot.handle("H", "!host");
    await bot.handle("P", "!join");

    expect((await bot.handle("P", "!leave"))?.description).toBe("P has left the game.");
    expect((await bot.handle("H", "!end"))?.description).toBe("H has ended the game.");
    expect(await bot.handle("H", "!info")).toEqual(
      error("There is no game to join. Use `!host` to host one."),
    );
  });

  it("reports players that vanished mid-game", async () => {
    const { bot, ctx, logger } = createBot();
    await bot.handle("H", "!host");
    await bot.handle("P", "!join");

    const guest = expectOk(await ctx.players.lookup("P"));
    guest.stop();

    expect(await bot.handle("H", "!start")).toEqual(
      error("Player P is unavailable. Try again in a moment."),
    );
    expect(logger.warn).toHaveBeenCalledWith("Chat command reached a stopped entity", {
      author: "H",
      command: "start",
      entity: "player",
      key: "P",
    });
  });

  it("logs unexpected failures and replies with a generic error", async () => {
    const logger = createLoggerMock();
    const failure = new Error("bus down");
    const ctx = createServerContext({
      logger,
      bus: {
        async publish(): Promise<void> {
          throw failure;
        },
      },
    });
    const bot = new ChatBot({ ctx, config, logger });

    expect(await bot.handle("H", "!host")).toEqual(
      error("Something went wrong while handling that command."),
    );
    expect(logger.error).toHaveBeenCalledWith("Chat command failed", {
      author: "H",
      command: "host",
      error: failure,
    });
  });

  it("lists the commands on help", async () => {
    const { bot } = createBot();
    const reply = await bot.handle("H", "!help");

    expect(reply?.title).toBe("GG.Bot - Guessing Game");
    expect(reply?.fields.map((field) => field.name)).toEqual([
      "Start...",
      "Play...",
      "Win!",
      "Commands",
    ]);
  });
});
