import type { Lobby } from "../entities/Lobby.js";
import type { Player } from "../entities/Player.js";
import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { LobbyNotFoundError } from "../errors/LobbyNotFoundError.js";
import type { ConnectionId } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

export function requirePlayer(
  { registry }: Pick<CommandContext, "registry">,
  connectionId: ConnectionId,
): Player {
  const player = registry.get(connectionId);
  if (!player) {
    throw GameCommandInputError.because(["Unknown connection"]);
  }
  return player;
}

export function requireLobby({ lobbies }: Pick<CommandContext, "lobbies">, player: Player): Lobby {
  if (player.lobbyCode === undefined) {
    throw GameCommandInputError.because(["You are not in a lobby"]);
  }
  const lobby = lobbies.get(player.lobbyCode);
  if (!lobby) {
    throw new LobbyNotFoundError(player.lobbyCode);
  }
  return lobby;
}

export function broadcastRoster(lobby: Lobby): void {
  lobby.broadcast({ type: "ROSTER_UPDATE", payload: { players: lobby.roster() } });
}

/**
 * Takes a connection out of its lobby. Runs inside `lobby.exclusive`.
 * The participant record stays behind so the same username can resume.
 * An emptied lobby is dropped from the directory and its timers cancelled.
 */
export function departLobby(
  lobby: Lobby,
  player: Player,
  { lobbies, scheduler, logger }: Pick<CommandContext, "lobbies" | "scheduler" | "logger">,
): void {
  const empty = lobby.removePlayer(player.id);

  logger?.info("Player left lobby", {
    lobbyCode: lobby.code,
    connectionId: player.id,
    username: player.username,
    phase: lobby.phase,
  });

  if (empty) {
    lobby.minigame?.stop();
    if (lobbies.get(lobby.code) === lobby) {
      lobbies.remove(lobby.code);
      scheduler.cancelLobby(lobby.code);
      logger?.info("Lobby closed", { lobbyCode: lobby.code });
    }
    return;
  }

  broadcastRoster(lobby);
}
