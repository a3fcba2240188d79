import { parseChatCommand, type ChatCommand } from "./commands.js";
import type { BotConfig } from "./config.js";
import {
  EntityUnavailableError,
  GameCommandInputError,
  facade,
  type GameConfigOverrides,
  type GameErrorKind,
  type Logger,
  type PlayerName,
  type Result,
  type ServerContext,
} from "./core.js";
import {
  describeConfig,
  describeGameError,
  errorReply,
  gameReply,
  helpReply,
  infoReply,
  nextTurnReply,
  outcomeReply,
  usageOf,
  type Reply,
} from "./replies.js";

export type { Reply, ReplyField, ReplyTone } from "./replies.js";
export { renderReply } from "./replies.js";
export { parseChatCommand, type ChatCommand } from "./commands.js";
export { loadBotConfig, type BotConfig } from "./config.js";

export interface ChatBotOptions {
  readonly ctx: ServerContext;
  readonly config: BotConfig;
  readonly logger: Logger;
}

const CONFIG_PARAMS: ReadonlyMap<string, keyof GameConfigOverrides> = new Map<
  string,
  keyof GameConfigOverrides
>([
  ["max_points", "maxPoints"],
  ["max_guess", "maxGuess"],
]);

/**
 * Chat front end for the game server. Each chat line from `author` is parsed,
 * run against the facade on the author's behalf (or a nickname's), and
 * answered with a reply.
 */
export class ChatBot {
  readonly #ctx: ServerContext;
  readonly #config: BotConfig;
  readonly #logger: Logger;

  constructor(options: ChatBotOptions) {
    this.#ctx = options.ctx;
    this.#config = options.config;
    this.#logger = options.logger;
  }

  /** `undefined` when the line is not addressed to the bot. */
  async handle(author: PlayerName, text: string): Promise<Reply | undefined> {
    const command = parseChatCommand(text, this.#config.prefix);
    if (!command) return undefined;

    this.#logger.debug?.("Chat command received", { author, command });

    try {
      return await this.#execute(author, command);
    } catch (error) {
      if (error instanceof GameCommandInputError) {
        return errorReply(this.#config, error.message);
      }
      if (error instanceof EntityUnavailableError) {
        this.#logger.warn?.("Chat command reached a stopped entity", {
          author,
          command: command.kind,
          entity: error.entity,
          key: error.key,
        });
        return errorReply(this.#config, `${error.message}. Try again in a moment.`);
      }

      this.#logger.error?.("Chat command failed", { author, command: command.kind, error });
      return errorReply(this.#config, "Something went wrong while handling that command.");
    }
  }

  async #execute(author: PlayerName, command: ChatCommand): Promise<Reply> {
    const ctx = this.#ctx;
    const config = this.#config;

    switch (command.kind) {
      case "help":
        return helpReply(config);

      case "host":
        return this.#reply(await facade.host(ctx, author, command.gameName), (game) =>
          infoReply(
            `${config.name} - New Game Hosted`,
            `A new game has been hosted by ${game.host}.\n` +
              `Use \`${config.prefix}join\` to join the game.`,
          ),
        );

      case "join":
        return this.#join(command.nickname ?? author, command.player);

      case "config":
        return this.#configure(author, command.param, command.value);

      case "start":
        return this.#reply(await facade.start(ctx, author), (next) =>
          nextTurnReply("Game started!", next, config),
        );

      case "play": {
        const player = command.nickname ?? author;
        return this.#reply(await facade.play(ctx, player, command.guess), ({ scored, outcome }) =>
          outcomeReply(player, scored, outcome, config),
        );
      }

      case "players":
        return this.#reply(await facade.players(ctx), (names) =>
          infoReply(
            `${config.name} - Player list`,
            names.length > 0 ? names.join("\n") : "No players are connected.",
          ),
        );

      case "info":
        return this.#reply(await facade.gameInfo(ctx, author), gameReply);

      case "restart":
        return this.#reply(await facade.restart(ctx, author), (next) =>
          nextTurnReply("Game Restarted", next, config),
        );

      case "leave":
        return this.#reply(await facade.leave(ctx, author), () =>
          infoReply("Left game", `${author} has left the game.`),
        );

      case "end":
        return this.#reply(await facade.end(ctx, author), () =>
          infoReply("Game ended", `${author} has ended the game.`),
        );

      case "usage":
        return errorReply(config, usageOf(command.command, config));

      case "unknown":
        return errorReply(
          config,
          `Unknown command \`${config.prefix}${command.name}\`. ` +
            `Use \`${config.prefix}help\` to list the commands.`,
        );
    }
  }

  async #join(player: PlayerName, existingPlayer: PlayerName | undefined): Promise<Reply> {
    const joined = await facade.join(this.#ctx, player, existingPlayer);
    if (!joined.ok) return this.#error(joined.error);

    return this.#reply(await facade.gameInfo(this.#ctx, player), (game) =>
      infoReply(
        `${this.#config.name} - Joined game`,
        `${player} has joined ${game.host}'s game.\n` +
          `${game.host} can use \`${this.#config.prefix}start\` to start the game.`,
      ),
    );
  }

  // Only the named parameter changes; the rest of the game's configuration is kept.
  async #configure(author: PlayerName, param: string, value: string): Promise<Reply> {
    const key = CONFIG_PARAMS.get(param);
    if (key === undefined) {
      return errorReply(this.#config, `__${param}__ is not a valid configuration parameter`);
    }

    const game = await facade.gameInfo(this.#ctx, author);
    if (!game.ok) return this.#error(game.error);

    const overrides: GameConfigOverrides = { ...game.value.config, [key]: Number(value) };
    return this.#reply(await facade.configure(this.#ctx, author, overrides), (updated) =>
      infoReply(
        "Configuration updated",
        `Parameter __${param}__ is now set to \`${value}\``,
        [{ name: "Configuration", value: describeConfig(updated) }],
      ),
    );
  }

  #reply<T>(result: Result<T>, render: (value: T) => Reply): Reply {
    return result.ok ? render(result.value) : this.#error(result.error);
  }

  #error(kind: GameErrorKind): Reply {
    return errorReply(this.#config, describeGameError(kind, this.#config));
  }
}
