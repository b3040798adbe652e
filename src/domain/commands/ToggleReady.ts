import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcastRoster, requireLobby, requirePlayer } from "./LobbyMembership.js";

export class ToggleReady extends Command {
  readonly type = "ToggleReady" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const player = requirePlayer(ctx, this.connectionId);
    const lobby = requireLobby(ctx, player);

    await lobby.exclusive(() => {
      if (lobby.isInTournament) {
        throw GameCommandInputError.because(["A tournament is already in progress"]);
      }
      player.isReady = !player.isReady;
      broadcastRoster(lobby);
    });
  }
}
