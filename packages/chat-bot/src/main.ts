import { createInterface } from "node:readline";

import { ChatBot } from "./ChatBot.js";
import { loadBotConfig } from "./config.js";
import { createServerContext, facade } from "./core.js";
import { createConsoleLogger } from "./logger.js";
import { renderReply } from "./replies.js";

const LINE_PATTERN = /^([^:]+):\s*(.*)$/;

/**
 * Feeds `<author>: <message>` lines from stdin to the bot and prints each
 * reply. Lines without an author are skipped.
 */
export async function runConsole(): Promise<void> {
  const config = loadBotConfig();
  const logger = createConsoleLogger("chat-bot", { debug: config.debug });
  const ctx = createServerContext({ logger });
  const bot = new ChatBot({ ctx, config, logger });

  logger.info?.("Chat bot ready", { name: config.name, prefix: config.prefix });

  const lines = createInterface({ input: process.stdin, crlfDelay: Infinity });

  for await (const line of lines) {
    const match = LINE_PATTERN.exec(line);
    const author = match?.[1]?.trim();
    const message = match?.[2];

    if (!author || message === undefined) {
      if (line.trim()) logger.warn?.("Ignoring line without an author", { line });
      continue;
    }

    const reply = await bot.handle(author, message);
    if (reply) {
      process.stdout.write(`${renderReply(reply)}\n\n`);
    }
  }

  await facade.reset(ctx);
}

void runConsole().catch((error: unknown) => {
  createConsoleLogger("chat-bot").error("Chat bot stopped", { error });
  process.exit(1);
});
