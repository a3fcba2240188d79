export type ChatCommand =
  | { readonly kind: "help" }
  | { readonly kind: "host"; readonly gameName?: string }
  | { readonly kind: "join"; readonly nickname?: string; readonly player?: string }
  | { readonly kind: "config"; readonly param: string; readonly value: string }
  | { readonly kind: "start" }
  | { readonly kind: "play"; readonly nickname?: string; readonly guess: number }
  | { readonly kind: "players" }
  | { readonly kind: "info" }
  | { readonly kind: "restart" }
  | { readonly kind: "end" }
  | { readonly kind: "leave" }
  /** A known command given arguments it cannot take */
  | { readonly kind: "usage"; readonly command: string }
  | { readonly kind: "unknown"; readonly name: string };

const BARE_COMMANDS = ["help", "start", "players", "info", "restart", "end", "leave"] as const;
type BareCommand = (typeof BARE_COMMANDS)[number];

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Reads one chat line. Lines that do not start with `prefix` are chatter and
 * yield `undefined`; everything else yields a command.
 */
export function parseChatCommand(text: string, prefix: string): ChatCommand | undefined {
  const line = text.trim();
  if (!line.startsWith(prefix)) return undefined;

  const [name = "", ...args] = line.slice(prefix.length).trim().split(/\s+/).filter(Boolean);
  const command = name.toLowerCase();

  if (isBareCommand(command)) {
    return { kind: command };
  }

  switch (command) {
    case "host": {
      const gameName = args.join(" ");
      return gameName ? { kind: "host", gameName } : { kind: "host" };
    }
    case "join":
      return parseJoin(args);
    case "config": {
      const [param, value] = args;
      return param !== undefined && value !== undefined && args.length === 2
        ? { kind: "config", param, value }
        : { kind: "usage", command };
    }
    case "play":
      return parsePlay(args);
    default:
      return { kind: "unknown", name: command };
  }
}

// join | join <nickname> | join player <player> | join <nickname> player <player>
function parseJoin(args: readonly string[]): ChatCommand {
  const [first, second, third] = args;

  switch (args.length) {
    case 0:
      return { kind: "join" };
    case 1:
      return first !== undefined ? { kind: "join", nickname: first } : { kind: "usage", command: "join" };
    case 2:
      return first === "player" && second !== undefined
        ? { kind: "join", player: second }
        : { kind: "usage", command: "join" };
    case 3:
      return first !== undefined && second === "player" && third !== undefined
        ? { kind: "join", nickname: first, player: third }
        : { kind: "usage", command: "join" };
    default:
      return { kind: "usage", command: "join" };
  }
}

// play <guess> | play <nickname> <guess>
function parsePlay(args: readonly string[]): ChatCommand {
  const guessText = args[args.length - 1];
  if (guessText === undefined || args.length > 2 || !INTEGER_PATTERN.test(guessText)) {
    return { kind: "usage", command: "play" };
  }

  const guess = Number.parseInt(guessText, 10);
  const [nickname] = args;
  return args.length === 2 && nickname !== undefined
    ? { kind: "play", nickname, guess }
    : { kind: "play", guess };
}

function isBareCommand(name: string): name is BareCommand {
  return BARE_COMMANDS.some((command) => command === name);
}
