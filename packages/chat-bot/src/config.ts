export interface BotConfig {
  /** Marks a chat line as a command, e.g. `!` in `!play 42` */
  readonly prefix: string;
  /** Shown in reply titles */
  readonly name: string;
  readonly debug: boolean;
}

export const DEFAULT_PREFIX = "!";
export const DEFAULT_BOT_NAME = "GG.Bot";

type Environment = Readonly<Record<string, string | undefined>>;

export function loadBotConfig(env: Environment = process.env): BotConfig {
  return {
    prefix: nonBlank(env["BOT_PREFIX"]) ?? DEFAULT_PREFIX,
    name: nonBlank(env["BOT_NAME"]) ?? DEFAULT_BOT_NAME,
    debug: isEnabled(env["DEBUG"]),
  };
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isEnabled(value: string | undefined): boolean {
  const normalized = value?.trim().toLowerCase();
  return normalized !== undefined && normalized !== "" && normalized !== "0" && normalized !== "false";
}
