export { ClientEventDecodeError } from "./ClientEventDecodeError.js";
export { GameCommandInputError } from "./GameCommandInputError.js";
export { InvalidTournamentStateError } from "./InvalidTournamentStateError.js";
export { LobbyNotFoundError } from "./LobbyNotFoundError.js";
