import type { BotConfig } from "./config.js";
import type {
  Bonus,
  GameConfig,
  GameErrorKind,
  GameSnapshot,
  NextTurn,
  PlayerName,
  PlayerRound,
  PlayerScore,
  TurnOutcome,
} from "./core.js";

export type ReplyTone = "info" | "error";

export interface ReplyField {
  readonly name: string;
  readonly value: string;
}

/** What the bot says back; a chat client decides how to draw it. */
export interface Reply {
  readonly title: string;
  readonly description: string;
  readonly fields: readonly ReplyField[];
  readonly tone: ReplyTone;
}

export function infoReply(
  title: string,
  description: string,
  fields: readonly ReplyField[] = [],
): Reply {
  return { title, description, fields, tone: "info" };
}

export function errorReply(config: BotConfig, description: string): Reply {
  return { title: `${config.name} Error!`, description, fields: [], tone: "error" };
}

export function describeGameError(kind: GameErrorKind, config: BotConfig): string {
  switch (kind) {
    case "player_not_host":
      return "This action can only be performed by the game host.";
    case "invalid_action_for_state":
      return "This action cannot be performed during this stage of the game.";
    case "player_not_found":
      return "This player is not on the game server.";
    case "player_in_game":
      return "This player is already in a game.";
    case "player_name_taken":
      return "That name is already taken.";
    case "game_not_found":
      return `There is no game to join. Use \`${config.prefix}host\` to host one.`;
    case "wrong_turn":
      return "It is not your turn.";
    case "out_of_range":
      return "That guess is outside the range of numbers in play.";
  }
}

export function usageOf(command: string, config: BotConfig): string {
  const p = config.prefix;
  switch (command) {
    case "join":
      return `Usage: \`${p}join [nickname] [player <player>]\``;
    case "config":
      return `Usage: \`${p}config <max_points|max_guess> <value>\``;
    case "play":
      return `Usage: \`${p}play [nickname] <guess>\``;
    default:
      return `Usage: \`${p}help\``;
  }
}

export function helpReply(config: BotConfig): Reply {
  const p = config.prefix;
  return infoReply(
    `${config.name} - Guessing Game`,
    "Guess the number that is assigned to you and score points based on how close you get. " +
      "Keep an eye out for special bonuses...",
    [
      { name: "Start...", value: "Join a hosted game" },
      { name: "Play...", value: "Guess your number!" },
      { name: "Win!", value: "Top score at the end wins!" },
      {
        name: "Commands",
        value: [
          `- \`${p}host [game name]\` host a game with you as the host`,
          `- \`${p}join [nickname]\` join the most recently hosted game`,
          `- \`${p}join [nickname] player <player>\` join the game <player> is in`,
          `- \`${p}config <max_points|max_guess> <value>\` configure the game (host only)`,
          `- \`${p}start\` start the game (host only)`,
          `- \`${p}play [nickname] <guess>\` guess your number during your turn`,
          `- \`${p}players\` list connected players`,
          `- \`${p}info\` show your game`,
          `- \`${p}restart\` restart the game (host only)`,
          `- \`${p}leave\` leave your game`,
          `- \`${p}end\` end the game (host only)`,
        ].join("\n"),
      },
    ],
  );
}

export function turnLine(round: number, player: PlayerName, config: BotConfig): string {
  return (
    `Round ${round + 1}, __${player}'s__ turn.\n` +
    `Use \`${config.prefix}play <number>\` to guess your assigned number`
  );
}

export function nextTurnReply(title: string, next: NextTurn, config: BotConfig): Reply {
  return infoReply(title, turnLine(next.round, next.player, config));
}

export function describeBonus({ value, reason }: Bonus): string {
  switch (reason.kind) {
    case "exact_match":
      return `+ You Guessed Correctly! \`${value}\` points!`;
    case "reverse_match":
      return `+ Oooh, Inverse Match - Nice! \`${value}\` points!`;
    case "other_match":
      return `+ Guessed __${reason.player}'s__ number! \`${value}\` points!`;
  }
}

export function roundLine(player: PlayerName, round: PlayerRound): string {
  const head =
    `__${player}__ => **${round.points ?? 0}** ` +
    `(*assigned* \`${round.assigned}\`, _guessed_ \`${round.guess ?? "-"}\`)`;
  return [head, ...round.bonuses.map(describeBonus)].join("\n");
}

function scoreLines(scores: readonly PlayerScore[], totalsLabel: string): ReplyField[] {
  const rounds = scores.map(({ player, round }) =>
    round ? roundLine(player, round) : `__${player}__ => **0**`,
  );
  const totals = scores.map(({ player, total }) => `__${player}__ => **${total}**`);
  return [
    { name: "Previous round", value: rounds.join("\n") },
    { name: totalsLabel, value: totals.join("\n") },
  ];
}

export function outcomeReply(
  player: PlayerName,
  scored: PlayerRound,
  outcome: TurnOutcome,
  config: BotConfig,
): Reply {
  switch (outcome.type) {
    case "next_turn":
      return infoReply("Next turn", turnLine(outcome.round, outcome.player, config), [
        { name: "Your guess", value: roundLine(player, scored) },
      ]);
    case "next_round":
      return infoReply(
        "New Round!",
        turnLine(outcome.round, outcome.player, config),
        scoreLines(outcome.scores, "Total so far"),
      );
    case "ended":
      return infoReply(
        "Game Over!",
        announceWinners(outcome.winners),
        scoreLines(outcome.scores, "Final score"),
      );
  }
}

function announceWinners(winners: readonly PlayerName[]): string {
  const names = winners.map((name) => `__${name}__`);
  return names.length === 1
    ? `Everyone wins! Just kidding...\n\n${names.join("")} wins!!`
    : `It's a tie between ${names.join(", ")}!`;
}

export function gameReply(game: GameSnapshot): Reply {
  return infoReply(game.name, game.summary, [
    { name: "Players", value: game.players.join("\n") },
    { name: "Configuration", value: describeConfig(game.config) },
  ]);
}

export function describeConfig(config: GameConfig): string {
  return `max_points \`${config.maxPoints}\`, max_guess \`${config.maxGuess}\``;
}

/** Plain-text rendering for terminals and logs. */
export function renderReply(reply: Reply): string {
  const lines = [reply.title, reply.description];
  for (const field of reply.fields) {
    lines.push("", `${field.name}:`, field.value);
  }
  return lines.join("\n");
}
