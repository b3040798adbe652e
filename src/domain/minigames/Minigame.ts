import type { Standing } from "../entities/TournamentRules.js";
import type { MinigameInput } from "../protocol/ClientEvent.js";
import type { LeaderboardView, ServerEvent } from "../protocol/ServerEvent.js";
import type { GameNumber, PlayerHandle, TimePoint } from "../typedefs.js";

export type InputOutcome = "applied" | "ignored" | "rejected";

export type MinigameStanding = Omit<Standing, "handle">;

/**
 * The slice of a lobby a running minigame may touch. It only ever sees the
 * active roster of the current round and the participant score it feeds.
 */
export interface RoundHost {
  readonly roundNumber: number;
  readonly activePlayers: readonly PlayerHandle[];
  isActivePlayer(handle: PlayerHandle): boolean;
  sendTo(handle: PlayerHandle, event: ServerEvent): void;
  broadcast(event: ServerEvent): void;
  addScore(handle: PlayerHandle, delta: number, at: TimePoint): void;
  leaderboardView(): LeaderboardView[];
}

/**
 * One round of one minigame. Built fresh for every round and thrown away once
 * the round is scored.
 */
export interface Minigame {
  readonly gameNumber: GameNumber;
  readonly durationMs: number;
  /** True from `start` until `stop`; input outside that window is dropped */
  readonly isActive: boolean;

  /** Round-start side effects: the initial payload for every player. */
  start(at: TimePoint): void;

  handleInput(handle: PlayerHandle, input: MinigameInput, at: TimePoint): InputOutcome;

  /**
   * Score this game ranks `handle` by, or undefined when the game keeps
   * no score of its own for that player.
   */
  standing(handle: PlayerHandle): MinigameStanding | undefined;

  /** Early-completion condition; checked after every applied input. */
  isComplete(): boolean;

  /** Re-send the round payload to a player who just reconnected. */
  sync(handle: PlayerHandle): void;

  stop(): void;
}
