import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import {
  createGameConfig,
  validateGameConfig,
  type GameConfig,
  type GameConfigOverrides,
} from "../GameConfig.js";
import { gameChannel } from "../ports/MessageBus.js";
import type { Result } from "../Result.js";
import type { PlayerName, TimePoint } from "../typedefs.js";
import { Command, type ServerContext } from "./Command.js";
import { assertPlayerNames, resolveHostedGame } from "./resolve.js";

/** Replaces the game's configuration with `overrides` laid over the defaults. */
export class ConfigureGame extends Command<GameConfig> {
  readonly type = "ConfigureGame" as const;
  readonly config: GameConfig;

  constructor(
    public readonly host: PlayerName,
    overrides: GameConfigOverrides,
    public readonly at: TimePoint,
  ) {
    super();
    assertPlayerNames([["Host name", host]]);

    this.config = createGameConfig(overrides);
    GameCommandInputError.assertNone(validateGameConfig(this.config));
  }

  async execute(ctx: ServerContext): Promise<Result<GameConfig>> {
    const { bus, logger } = ctx;

    const game = await resolveHostedGame(ctx, this.host);
    if (!game.ok) return game;

    const configured = await game.value.configure(this.config);
    if (!configured.ok) return configured;

    logger?.info?.("Game configured", {
      type: this.type,
      gameId: game.value.id,
      config: configured.value,
      at: this.at,
    });

    await bus.publish(gameChannel(game.value.id), {
      type: "GameConfigured",
      gameId: game.value.id,
      config: configured.value,
      at: this.at,
    });

    return configured;
  }
}
