import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import type { AvatarShape, ConnectionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcastRoster, requirePlayer } from "./LobbyMembership.js";

export class UpdateProfile extends Command {
  readonly type = "UpdateProfile" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly changes: {
      readonly color: string | undefined;
      readonly shape: AvatarShape | undefined;
      readonly username: string | undefined;
    },
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { lobbies, profiles, logger } = ctx;
    const player = requirePlayer(ctx, this.connectionId);
    const { color, shape, username } = this.changes;

    // The username is the handle the identity provider vouched for.
    if (username !== undefined && username !== player.username) {
      throw GameCommandInputError.because(["Your username is set at login and cannot be changed"]);
    }

    if (color !== undefined || shape !== undefined) {
      await profiles.updateProfile(player.username, { color, shape });
    }

    const lobby = player.lobbyCode === undefined ? undefined : lobbies.get(player.lobbyCode);
    const apply = (): void => {
      player.updateProfile(color, shape);
      player.channel.send({
        type: "PROFILE_ACK",
        payload: { username: player.username, color: player.color, shape: player.shape },
      });
      if (lobby) broadcastRoster(lobby);
    };

    if (lobby) {
      await lobby.exclusive(apply);
    } else {
      apply();
    }

    logger?.info("Profile updated", {
      type: this.type,
      connectionId: player.id,
      username: player.username,
      color: player.color,
      shape: player.shape,
      at: this.at,
    });
  }
}
