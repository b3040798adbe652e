import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcastRoster, requirePlayer } from "./LobbyMembership.js";

export class CreateLobby extends Command {
  readonly type = "CreateLobby" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly capacity: number | undefined,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { lobbies, config, logger } = ctx;
    const player = requirePlayer(ctx, this.connectionId);

    if (player.lobbyCode !== undefined) {
      throw GameCommandInputError.because(["Leave your current lobby first"]);
    }

    const lobby = lobbies.create(player, this.capacity ?? config.defaultCapacity);

    logger?.info("Lobby created", {
      type: this.type,
      lobbyCode: lobby.code,
      host: player.username,
      capacity: lobby.capacity,
      at: this.at,
    });

    await lobby.exclusive(() => {
      lobby.sendToConnection(player.id, {
        type: "LOBBY_JOINED",
        payload: { ...lobby.summary(), capacity: lobby.capacity, rejoined: false },
      });
      broadcastRoster(lobby);
    });
  }
}
