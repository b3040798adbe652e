/* eslint-disable functional/immutable-data */
import { Player } from "../entities/Player.js";
import type { PlayerChannel } from "../ports/PlayerChannel.js";
import type { PlayerProfile } from "../ports/ProfileStore.js";
import type { ConnectionId } from "../typedefs.js";

/**
 * Process-wide table of live connections. Ids are minted here and never
 * reused for the lifetime of the process.
 */
export class ConnectionRegistry {
  readonly #players = new Map<ConnectionId, Player>();
  #nextId = 1;

  register(
    channel: PlayerChannel,
    username: string,
    profile?: Pick<PlayerProfile, "color" | "shape">,
  ): Player {
    const id = `conn-${this.#nextId++}`;
    const player = new Player(id, username, channel, profile);
    this.#players.set(id, player);
    return player;
  }

  /** Idempotent: removing an unknown id returns undefined. */
  unregister(id: ConnectionId): Player | undefined {
    const player = this.#players.get(id);
    this.#players.delete(id);
    return player;
  }

  get(id: ConnectionId): Player | undefined {
    return this.#players.get(id);
  }

  get size(): number {
    return this.#players.size;
  }
}
