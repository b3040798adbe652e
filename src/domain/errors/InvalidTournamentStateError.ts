import type { LobbyCode, TournamentPhase } from "../typedefs.js";

export class InvalidTournamentStateError extends Error {
  constructor(
    public readonly reason: string,
    public readonly lobbyCode: LobbyCode,
    public readonly phase: TournamentPhase,
  ) {
    super(`Invalid tournament state in lobby ${lobbyCode} (${phase}): ${reason}`);
    this.name = "InvalidTournamentStateError";
  }
}
