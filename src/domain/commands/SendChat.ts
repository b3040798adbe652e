import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { requireLobby, requirePlayer } from "./LobbyMembership.js";

export class SendChat extends Command {
  readonly type = "SendChat" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly message: string,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const player = requirePlayer(ctx, this.connectionId);
    const lobby = requireLobby(ctx, player);

    const text = this.message.trim().slice(0, ctx.config.chatMessageMaxLength);
    if (text.length === 0) {
      throw GameCommandInputError.because(["Message cannot be empty"]);
    }

    await lobby.exclusive(() => {
      lobby.broadcast({ type: "CHAT_INCOMING", payload: { sender: player.username, text } });
    });
  }
}
