import type { LobbyCode } from "../typedefs.js";

export class LobbyNotFoundError extends Error {
  constructor(public readonly code: LobbyCode) {
    super(`Lobby not found: ${code}`);
    this.name = "LobbyNotFoundError";
  }
}
