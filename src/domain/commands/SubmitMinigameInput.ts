import type { MinigameInput } from "../protocol/ClientEvent.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { requirePlayer } from "./LobbyMembership.js";
import { finishRound } from "./TournamentFlow.js";

/**
 * Routes one answer to the running minigame. Input with no running round to
 * receive it is dropped without a reply.
 */
export class SubmitMinigameInput extends Command {
  readonly type = "SubmitMinigameInput" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly input: MinigameInput,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<void> {
    const { lobbies, logger } = ctx;
    const player = requirePlayer(ctx, this.connectionId);
    const lobby = player.lobbyCode === undefined ? undefined : lobbies.get(player.lobbyCode);
    if (!lobby) return;

    await lobby.exclusive(async () => {
      const minigame = lobby.minigame;
      if (lobby.phase !== "running" || !minigame) {
        logger?.debug("Input dropped; no round running", {
          lobbyCode: lobby.code,
          input: this.input.type,
        });
        return;
      }

      const outcome = minigame.handleInput(player.username, this.input, this.at);
      if (outcome === "applied" && minigame.isComplete()) {
        logger?.info("Round complete before its timer", {
          lobbyCode: lobby.code,
          roundNumber: lobby.roundNumber,
        });
        await finishRound(lobby, this.at, ctx);
      }
    });
  }
}
