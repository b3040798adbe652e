// Identifiers and small value types shared by the lobby, minigames and protocol.

/** Identifier of one live transport connection, minted at handshake */
export type ConnectionId = string;

/**
 * Stable logical identity of a player inside a tournament.
 * This is the username, so it survives a reconnect.
 */
export type PlayerHandle = string;

/** Short human-typeable lobby code */
export type LobbyCode = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Minigame identifier: math quiz, speed typing, trivia race */
export type GameNumber = 1 | 2 | 3;

/** Source of uniformly distributed numbers in [0, 1) */
export type RandomSource = () => number;

export const AVATAR_SHAPES = ["square", "circle", "triangle", "star", "hexagon"] as const;

/** Avatar shape a player can pick */
export type AvatarShape = (typeof AVATAR_SHAPES)[number];

/** Tournament phase enumeration */
export type TournamentPhase = "lobby" | "preview" | "running" | "round_end" | "finished";

/** Timers the orchestrator schedules between phases */
export type TimedPhase = "preview" | "round" | "intermission";

const SHAPE_NAMES: ReadonlySet<string> = new Set(AVATAR_SHAPES);

export function isAvatarShape(value: unknown): value is AvatarShape {
  return typeof value === "string" && SHAPE_NAMES.has(value);
}
