import type { LobbyCode, TimedPhase, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { beginPreview, beginRound, finishRound } from "./TournamentFlow.js";

/**
 * Fired by the scheduler. A timeout for another round, another phase or a
 * lobby that is gone is stale and does nothing.
 */
export class PhaseTimeout extends Command {
  readonly type = "PhaseTimeout" as const;

  constructor(
    public readonly lobbyCode: LobbyCode,
    public readonly phase: TimedPhase,
    public readonly roundNumber: number,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { lobbies, logger } = ctx;
    const lobby = lobbies.get(this.lobbyCode);
    if (!lobby) {
      logger?.debug("Timeout for a closed lobby", { lobbyCode: this.lobbyCode, phase: this.phase });
      return;
    }

    await lobby.exclusive(async () => {
      if (lobbies.get(this.lobbyCode) !== lobby || lobby.roundNumber !== this.roundNumber) {
        return;
      }

      if (this.phase === "preview" && lobby.phase === "preview") {
        await beginRound(lobby, this.at, ctx);
        return;
      }

      if (this.phase === "round" && lobby.phase === "running") {
        await finishRound(lobby, this.at, ctx);
        return;
      }

      const nextGame = lobby.nextGame;
      if (this.phase === "intermission" && lobby.phase === "round_end" && nextGame !== undefined) {
        await beginPreview(lobby, nextGame, this.at, ctx);
        return;
      }

      logger?.debug("Stale timeout ignored", {
        type: this.type,
        lobbyCode: this.lobbyCode,
        phase: this.phase,
        roundNumber: this.roundNumber,
        lobbyPhase: lobby.phase,
      });
    });
  }
}
