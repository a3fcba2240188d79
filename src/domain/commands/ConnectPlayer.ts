import { PlayerActor } from "../actors/PlayerActor.js";
import type { PlayerState } from "../entities/PlayerLedger.js";
import { SERVER_CHANNEL } from "../ports/MessageBus.js";
import { fail, ok, type Result } from "../Result.js";
import type { PlayerName, TimePoint } from "../typedefs.js";
import { Command, type ServerContext } from "./Command.js";
import { assertPlayerNames } from "./resolve.js";

export class ConnectPlayer extends Command<PlayerState> {
  readonly type = "ConnectPlayer" as const;

  constructor(
    public readonly player: PlayerName,
    public readonly at: TimePoint,
  ) {
    super();
    assertPlayerNames([["Player name", player]]);
  }

  async execute(ctx: ServerContext): Promise<Result<PlayerState>> {
    const { players, bus, logger } = ctx;

    const actor = new PlayerActor(this.player, logger ? { logger } : {});
    const registered = await players.register(this.player, actor);
    if (!registered.ok) {
      actor.stop();
      return fail("player_name_taken");
    }

    logger?.info?.("Player connected", { type: this.type, player: this.player, at: this.at });

    await bus.publish(SERVER_CHANNEL, {
      type: "PlayerConnected",
      player: this.player,
      at: this.at,
    });

    return ok(await actor.info());
  }
}
