import type { GameSnapshot } from "../actors/GameActor.js";
import type { PlayerState } from "../entities/PlayerLedger.js";
import { fail, ok, type Result } from "../Result.js";
import type { GameId, PlayerName, TimePoint } from "../typedefs.js";
import { Command, type ServerContext } from "./Command.js";
import { assertPlayerNames, resolveGame } from "./resolve.js";

// Read-only verbs. They publish nothing.

export class ListPlayers extends Command<readonly PlayerName[]> {
  readonly type = "ListPlayers" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute(ctx: ServerContext): Promise<Result<readonly PlayerName[]>> {
    return ok(await ctx.players.list());
  }
}

export class DescribeGame extends Command<GameSnapshot> {
  readonly type = "DescribeGame" as const;

  constructor(
    public readonly player: PlayerName,
    public readonly at: TimePoint,
  ) {
    super();
    assertPlayerNames([["Player name", player]]);
  }

  async execute(ctx: ServerContext): Promise<Result<GameSnapshot>> {
    const game = await resolveGame(ctx, this.player);
    if (!game.ok) return game;
    return ok(await game.value.info());
  }
}

export class DescribePlayer extends Command<PlayerState> {
  readonly type = "DescribePlayer" as const;

  constructor(
    public readonly player: PlayerName,
    public readonly at: TimePoint,
  ) {
    super();
    assertPlayerNames([["Player name", player]]);
  }

  async execute(ctx: ServerContext): Promise<Result<PlayerState>> {
    const actor = await ctx.players.lookup(this.player);
    if (!actor.ok) return fail("player_not_found");
    return ok(await actor.value.info());
  }
}

export interface GameSummary {
  readonly id: GameId;
  readonly summary: string;
}

export interface ServerSummary {
  readonly players: readonly PlayerName[];
  readonly games: readonly GameSummary[];
}

export class DescribeServer extends Command<ServerSummary> {
  readonly type = "DescribeServer" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute(ctx: ServerContext): Promise<Result<ServerSummary>> {
    const { players, games } = ctx;
    const ids = await games.list();

    const summaries = await Promise.all(
      ids.map(async (id): Promise<GameSummary[]> => {
        const game = await games.lookup(id);
        if (!game.ok) return [];
        const { summary } = await game.value.info();
        return [{ id, summary }];
      }),
    );

    return ok({ players: await players.list(), games: summaries.flat() });
  }
}
