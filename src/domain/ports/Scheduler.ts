import type { LobbyCode, TimedPhase } from "../typedefs.js";

/**
 * Infrastructure abstraction responsible for delivering time-based commands to the domain.
 *
 * Implementations deliver a {@link PhaseTimeout} command once the delay elapses. Only one
 * timeout per lobby phase is live at a time; scheduling the same phase again replaces it.
 * The orchestrator tolerates late or duplicate deliveries, so exactly-once is not required.
 */
export interface Scheduler {
  scheduleTimeout(
    lobbyCode: LobbyCode,
    phase: TimedPhase,
    roundNumber: number,
    delayMs: number,
  ): Promise<void>;

  /** Drop every pending timeout of a lobby that no longer exists. */
  cancelLobby(lobbyCode: LobbyCode): void;
}
