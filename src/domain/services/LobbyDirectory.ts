/* eslint-disable functional/immutable-data */
import { Lobby } from "../entities/Lobby.js";
import type { Player } from "../entities/Player.js";
import type { GameConfig } from "../GameConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { LobbySummary } from "../protocol/ServerEvent.js";
import type { LobbyCode, RandomSource } from "../typedefs.js";

export const LOBBY_CODE_ALPHABET = "ABCDEFGHJKLMNPQRSTUVWXYZ23456789";
export const LOBBY_CODE_LENGTH = 6;

const MAX_CODE_ATTEMPTS = 100;

export function generateLobbyCode(random: RandomSource): LobbyCode {
  let code = "";
  for (let i = 0; i < LOBBY_CODE_LENGTH; i += 1) {
    const index = Math.floor(random() * LOBBY_CODE_ALPHABET.length);
    code += LOBBY_CODE_ALPHABET.charAt(index);
  }
  return code;
}

export interface LobbyDirectoryOptions {
  readonly config: GameConfig;
  readonly random: RandomSource;
  readonly logger?: Logger;
}

export class LobbyDirectory {
  readonly #lobbies = new Map<LobbyCode, Lobby>();

  constructor(private readonly options: LobbyDirectoryOptions) {}

  create(host: Player, capacity: number): Lobby {
    const { config, logger } = this.options;
    const code = this.#uniqueCode();
    const lobby = new Lobby(code, host, capacity, {
      minCapacity: config.minCapacity,
      maxCapacity: config.maxCapacity,
      logger,
    });
    this.#lobbies.set(code, lobby);
    return lobby;
  }

  get(code: LobbyCode): Lobby | undefined {
    return this.#lobbies.get(code);
  }

  remove(code: LobbyCode): boolean {
    return this.#lobbies.delete(code);
  }

  list(): LobbySummary[] {
    return [...this.#lobbies.values()].map((lobby) => lobby.summary());
  }

  get size(): number {
    return this.#lobbies.size;
  }

  #uniqueCode(): LobbyCode {
    for (let attempt = 0; attempt < MAX_CODE_ATTEMPTS; attempt += 1) {
      const code = generateLobbyCode(this.options.random);
      if (!this.#lobbies.has(code)) return code;
    }
    throw new Error("Could not allocate a free lobby code");
  }
}
