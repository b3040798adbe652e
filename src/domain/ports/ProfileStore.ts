import type { AvatarShape } from "../typedefs.js";

export interface PlayerProfile {
  readonly username: string;
  readonly color: string;
  readonly shape: AvatarShape;
  readonly wins: number;
  readonly losses: number;
  readonly totalGames: number;
}

export interface ProfileChanges {
  readonly color?: string;
  readonly shape?: AvatarShape;
}

export type TournamentOutcome = "win" | "loss";

/**
 * Narrow contract onto the persistent profile/statistics database.
 * The core reads a profile at connect time and writes statistics when a
 * tournament ends; it never sees the storage schema.
 */
export interface ProfileStore {
  /** Returns the stored profile, or a default one for an unknown username. */
  getProfile(username: string): Promise<PlayerProfile>;
  updateProfile(username: string, changes: ProfileChanges): Promise<PlayerProfile>;
  recordResult(username: string, outcome: TournamentOutcome): Promise<void>;
}
