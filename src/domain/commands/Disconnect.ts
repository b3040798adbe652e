import type { ConnectionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { departLobby } from "./LobbyMembership.js";

/** Transport closed. A normal lifecycle event: clean up and tell the others. */
export class Disconnect extends Command {
  readonly type = "Disconnect" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { registry, lobbies, logger } = ctx;
    const player = registry.unregister(this.connectionId);
    if (!player) return;

    logger?.info("Connection closed", {
      type: this.type,
      connectionId: player.id,
      username: player.username,
      at: this.at,
    });

    const lobby = player.lobbyCode === undefined ? undefined : lobbies.get(player.lobbyCode);
    if (!lobby) return;

    await lobby.exclusive(() => {
      if (lobby.getPlayer(player.id)) {
        departLobby(lobby, player, ctx);
      }
    });
  }
}
