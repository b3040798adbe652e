import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { requireLobby, requirePlayer } from "./LobbyMembership.js";
import { startTournament } from "./TournamentFlow.js";

export class StartGame extends Command {
  readonly type = "StartGame" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly testMode: boolean,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { config, logger } = ctx;
    const player = requirePlayer(ctx, this.connectionId);
    const lobby = requireLobby(ctx, player);

    await lobby.exclusive(async () => {
      if (player.username !== lobby.hostHandle) {
        throw GameCommandInputError.because(["Only the host can start the game"]);
      }
      if (lobby.isInTournament) {
        throw GameCommandInputError.because(["A tournament is already in progress"]);
      }
      if (this.testMode && !config.allowTestMode) {
        throw GameCommandInputError.because(["Test mode is disabled on this server"]);
      }

      if (!this.testMode) {
        const issues: string[] = [];
        if (lobby.size < config.minPlayersToStart) {
          issues.push(`At least ${config.minPlayersToStart} players are needed to start`);
        }
        if (!lobby.allReady) {
          issues.push("All players must be ready");
        }
        if (issues.length > 0) {
          throw GameCommandInputError.because(issues);
        }
      } else {
        logger?.warn("Starting tournament in test mode", {
          type: this.type,
          lobbyCode: lobby.code,
        });
      }

      await startTournament(lobby, this.at, ctx);
    });
  }
}
