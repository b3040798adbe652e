import type { PlayerChannel } from "../ports/PlayerChannel.js";
import type { PlayerProfile } from "../ports/ProfileStore.js";
import type { PlayerView } from "../protocol/ServerEvent.js";
import type { AvatarShape, ConnectionId, LobbyCode } from "../typedefs.js";

export const DEFAULT_COLOR = "#4a148c";
export const DEFAULT_SHAPE: AvatarShape = "circle";

/**
 * One live connection: profile plus transient session flags.
 * The lobby code is a back-reference only; the lobby owns membership.
 */
export class Player {
  color: string = DEFAULT_COLOR;
  shape: AvatarShape = DEFAULT_SHAPE;
  isReady = false;
  isHost = false;
  lobbyCode: LobbyCode | undefined = undefined;

  constructor(
    public readonly id: ConnectionId,
    public readonly username: string,
    public readonly channel: PlayerChannel,
    profile?: Pick<PlayerProfile, "color" | "shape">,
  ) {
    if (profile) {
      this.color = profile.color;
      this.shape = profile.shape;
    }
  }

  updateProfile(color: string | undefined, shape: AvatarShape | undefined): void {
    if (color !== undefined) this.color = color;
    if (shape !== undefined) this.shape = shape;
  }

  toView(): PlayerView {
    return {
      id: this.id,
      handle: this.username,
      username: this.username,
      color: this.color,
      shape: this.shape,
      is_ready: this.isReady,
      is_host: this.isHost,
    };
  }
}
