import type { ConnectionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { departLobby, requireLobby, requirePlayer } from "./LobbyMembership.js";

export class LeaveLobby extends Command {
  readonly type = "LeaveLobby" as const;

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
      lobby.sendToConnection(player.id, { type: "LOBBY_LEFT", payload: { id: lobby.code } });
      departLobby(lobby, player, ctx);
    });
  }
}
