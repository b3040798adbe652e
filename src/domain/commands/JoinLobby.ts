import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { LobbyNotFoundError } from "../errors/LobbyNotFoundError.js";
import type { ConnectionId, LobbyCode, TimePoint } from "../typedefs.js";
import { gameInfo } from "../minigames/catalog.js";
import { Command, type CommandContext } from "./Command.js";
import { broadcastRoster, requirePlayer } from "./LobbyMembership.js";

export class JoinLobby extends Command {
  readonly type = "JoinLobby" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly lobbyCode: LobbyCode,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { lobbies, config, logger } = ctx;
    const player = requirePlayer(ctx, this.connectionId);

    if (player.lobbyCode === this.lobbyCode) {
      logger?.info("Join ignored; already in this lobby", {
        type: this.type,
        lobbyCode: this.lobbyCode,
        connectionId: this.connectionId,
      });
      return;
    }
    if (player.lobbyCode !== undefined) {
      throw GameCommandInputError.because(["Leave your current lobby first"]);
    }

    const lobby = lobbies.get(this.lobbyCode);
    if (!lobby) {
      throw new LobbyNotFoundError(this.lobbyCode);
    }

    await lobby.exclusive(() => {
      // The last player may have left while this join waited in the queue.
      if (lobbies.get(this.lobbyCode) !== lobby) {
        throw new LobbyNotFoundError(this.lobbyCode);
      }

      const handle = player.username;
      const previous = lobby.getParticipant(handle);
      const rejoined = previous !== undefined && previous.connectionId === undefined;

      if (!lobby.addPlayer(player)) {
        throw GameCommandInputError.because([
          lobby.isFull ? "Lobby is full" : `${handle} is already in this lobby`,
        ]);
      }

      logger?.info("Player joined lobby", {
        type: this.type,
        lobbyCode: lobby.code,
        connectionId: player.id,
        username: handle,
        rejoined,
        at: this.at,
      });

      lobby.sendToConnection(player.id, {
        type: "LOBBY_JOINED",
        payload: { ...lobby.summary(), capacity: lobby.capacity, rejoined },
      });
      broadcastRoster(lobby);

      if (!lobby.isInTournament) return;

      const nextGame = lobby.nextGame;
      if (lobby.phase === "preview" && nextGame !== undefined) {
        lobby.sendTo(handle, {
          type: "GAME_PREVIEW",
          payload: {
            game_number: nextGame,
            game_info: gameInfo(nextGame, config),
            round_number: lobby.roundNumber,
          },
        });
      }
      if (lobby.phase === "running") {
        lobby.minigame?.sync(handle);
      }
      lobby.sendTo(handle, {
        type: "SCORE_UPDATE",
        payload: { leaderboard: lobby.leaderboardView() },
      });
    });
  }
}
