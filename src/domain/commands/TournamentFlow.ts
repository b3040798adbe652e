import { toLeaderboardView, type Lobby, type LeaderboardEntry } from "../entities/Lobby.js";
import { InvalidTournamentStateError } from "../errors/InvalidTournamentStateError.js";
import { createMinigame, gameInfo } from "../minigames/catalog.js";
import type { GameNumber, TimePoint } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

type FlowContext = Pick<CommandContext, "scheduler" | "config" | "random" | "profiles" | "logger">;

export const NO_WINNER = "no one";

/** Lobby/finished → preview. Callers have already checked the preconditions. */
export async function startTournament(lobby: Lobby, at: TimePoint, ctx: FlowContext): Promise<void> {
  lobby.beginTournament();

  ctx.logger?.info("Tournament started", {
    lobbyCode: lobby.code,
    players: [...lobby.activePlayers],
    at,
  });

  await beginPreview(lobby, lobby.selectNextGame(ctx.random), at, ctx);
}

export async function beginPreview(
  lobby: Lobby,
  game: GameNumber,
  at: TimePoint,
  { scheduler, config, logger }: FlowContext,
): Promise<void> {
  lobby.enterPreview(game);

  logger?.info("Round entering preview", {
    lobbyCode: lobby.code,
    roundNumber: lobby.roundNumber,
    game,
    at,
  });

  lobby.broadcast({
    type: "GAME_PREVIEW",
    payload: {
      game_number: game,
      game_info: gameInfo(game, config),
      round_number: lobby.roundNumber,
    },
  });

  await scheduler.scheduleTimeout(lobby.code, "preview", lobby.roundNumber, config.previewDurationMs);
}

export async function beginRound(
  lobby: Lobby,
  at: TimePoint,
  { scheduler, config, random, logger }: FlowContext,
): Promise<void> {
  const game = lobby.nextGame;
  if (game === undefined) {
    throw new InvalidTournamentStateError("No game selected for the round", lobby.code, lobby.phase);
  }

  const minigame = createMinigame(game, lobby, config, random);
  lobby.enterRunning(minigame);
  minigame.start(at);

  logger?.info("Round running", {
    lobbyCode: lobby.code,
    roundNumber: lobby.roundNumber,
    game,
    players: [...lobby.activePlayers],
    at,
  });

  await scheduler.scheduleTimeout(lobby.code, "round", lobby.roundNumber, minigame.durationMs);
}

/**
 * Running → round end. Advancement is computed while the minigame is still
 * attached so race rounds rank by track position.
 */
export async function finishRound(lobby: Lobby, at: TimePoint, ctx: FlowContext): Promise<void> {
  if (lobby.phase !== "running") {
    throw new InvalidTournamentStateError("Round is not running", lobby.code, lobby.phase);
  }

  const { config, scheduler, random, logger } = ctx;
  lobby.minigame?.stop();
  const { advancing, eliminated } = lobby.advancePlayers();

  const finished =
    lobby.roundNumber >= config.eliminationRounds || lobby.activePlayers.length <= 1;
  const nextGame = finished ? undefined : lobby.selectNextGame(random);
  lobby.enterRoundEnd(nextGame);

  logger?.info("Round finished", {
    lobbyCode: lobby.code,
    roundNumber: lobby.roundNumber,
    advancing: advancing.map((entry) => entry.handle),
    eliminated: eliminated.map((entry) => entry.handle),
    nextGame,
    at,
  });

  lobby.broadcast({
    type: "ROUND_END",
    payload: {
      round_number: lobby.roundNumber,
      advancing: advancing.map(toLeaderboardView),
      eliminated: eliminated.map(toLeaderboardView),
      next_game: nextGame ?? null,
    },
  });

  if (nextGame === undefined) {
    await finishTournament(lobby, advancing[0], at, ctx);
    return;
  }

  await scheduler.scheduleTimeout(
    lobby.code,
    "intermission",
    lobby.roundNumber,
    config.intermissionDurationMs,
  );
}

export async function finishTournament(
  lobby: Lobby,
  winner: LeaderboardEntry | undefined,
  at: TimePoint,
  { profiles, logger }: FlowContext,
): Promise<void> {
  const competitors = [...lobby.activePlayers, ...lobby.spectators];
  lobby.finishTournament();

  logger?.info("Tournament finished", {
    lobbyCode: lobby.code,
    winner: winner?.handle,
    at,
  });

  lobby.broadcast({
    type: "TOURNAMENT_WINNER",
    payload: {
      winner: winner?.username ?? NO_WINNER,
      player: winner ? toLeaderboardView(winner) : null,
    },
  });

  for (const handle of competitors) {
    const outcome = handle === winner?.handle ? "win" : "loss";
    try {
      await profiles.recordResult(handle, outcome);
    } catch (error) {
      logger?.error("Failed to record tournament result", {
        lobbyCode: lobby.code,
        handle,
        outcome,
        error,
      });
    }
  }
}
