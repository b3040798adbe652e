import { createGameConfig, type GameConfig } from "./core.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export interface ServerConfig {
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly game: GameConfig;
}

export const DEFAULT_PORT = 8787;

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Reads the process environment. Unset variables fall back to the game
 * defaults; a set but malformed value is a startup error.
 */
export function loadServerConfig(env: Env): ServerConfig {
  return {
    port: readInteger(env, "PORT") ?? DEFAULT_PORT,
    logLevel: readLogLevel(env),
    game: createGameConfig({
      allowTestMode: readFlag(env, "ALLOW_TEST_MODE"),
      previewDurationMs: readInteger(env, "PREVIEW_MS"),
      intermissionDurationMs: readInteger(env, "INTERMISSION_MS"),
      eliminationRounds: readInteger(env, "ELIMINATION_ROUNDS"),
      trustClientRaceGrading: readFlag(env, "TRUST_CLIENT_RACE_GRADING"),
    }),
  };
}

function readInteger(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative whole number, got "${raw}"`);
  }
  return value;
}

function readLogLevel(env: Env): LogLevel {
  const raw = env["LOG_LEVEL"]?.trim().toLowerCase();
  if (raw === undefined || raw === "") {
    return env["DEBUG"] ? "debug" : "info";
  }
  if (!isLogLevel(raw)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, got "${raw}"`);
  }
  return raw;
}

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

function readFlag(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === "") {
    return undefined;
  }
  return TRUE_VALUES.has(raw);
}
