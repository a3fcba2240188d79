import { GameActor, type GameSnapshot } from "../actors/GameActor.js";
import { gameChannel } from "../ports/MessageBus.js";
import { ok, type Result } from "../Result.js";
import type { PlayerName, TimePoint } from "../typedefs.js";
import { vacateEndedGame } from "./closeGame.js";
import { Command, type ServerContext } from "./Command.js";
import { assertPlayerNames, ensurePlayer } from "./resolve.js";

export class HostGame extends Command<GameSnapshot> {
  readonly type = "HostGame" as const;

  constructor(
    public readonly host: PlayerName,
    public readonly gameName: string | undefined,
    public readonly at: TimePoint,
  ) {
    super();
    const names: Array<readonly [string, unknown]> = [["Host name", host]];
    if (gameName !== undefined) names.push(["Game name", gameName]);
    assertPlayerNames(names);
  }

  async execute(ctx: ServerContext): Promise<Result<GameSnapshot>> {
    const { players, games, bus, random, logger } = ctx;

    await ensurePlayer(ctx, this.host);

    const vacated = await vacateEndedGame(ctx, this.host, undefined, this.at);
    if (!vacated.ok) return vacated;

    const id = games.nextId();
    const game = new GameActor({
      id,
      host: this.host,
      name: this.gameName ?? this.host,
      players,
      random,
      ...(logger ? { logger } : {}),
    });

    const registered = await games.register(id, game);
    if (!registered.ok) {
      game.stop();
      throw new Error(`Game identifier ${id} is already in use`);
    }

    await players.assignGame(this.host, id);
    const snapshot = await game.info();

    logger?.info?.("Game hosted", {
      type: this.type,
      gameId: id,
      host: this.host,
      at: this.at,
    });

    await bus.publish(gameChannel(id), {
      type: "GameHosted",
      gameId: id,
      host: this.host,
      name: snapshot.name,
      config: snapshot.config,
      at: this.at,
    });

    return ok(snapshot);
  }
}
