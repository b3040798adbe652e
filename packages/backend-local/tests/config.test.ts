import { describe, expect, it } from "vitest";

import { DEFAULT_PORT, loadServerConfig } from "../src/config.js";
import { createGameConfig } from "../src/core.js";

describe("loadServerConfig", () => {
  it("falls back to the defaults", () => {
    expect(loadServerConfig({})).toEqual({
      port: DEFAULT_PORT,
      logLevel: "info",
      game: createGameConfig(),
    });
  });

  it("reads the supported variables", () => {
    const config = loadServerConfig({
      PORT: "9000",
      LOG_LEVEL: "WARN",
      ALLOW_TEST_MODE: "yes",
      PREVIEW_MS: "1500",
      INTERMISSION_MS: " 0 ",
      ELIMINATION_ROUNDS: "2",
      TRUST_CLIENT_RACE_GRADING: "off",
    });

    expect(config.port).toBe(9000);
    expect(config.logLevel).toBe("warn");
    expect(config.game).toMatchObject({
      allowTestMode: true,
      previewDurationMs: 1_500,
      intermissionDurationMs: 0,
      eliminationRounds: 2,
      trustClientRaceGrading: false,
    });
  });

  it("turns on debug logging when DEBUG is set", () => {
    expect(loadServerConfig({ DEBUG: "1" }).logLevel).toBe("debug");
  });

  it.each([
    ["PORT", "80.5"],
    ["PREVIEW_MS", "-1"],
    ["ELIMINATION_ROUNDS", "three"],
  ])("refuses %s=%s", (key, raw) => {
    expect(() => loadServerConfig({ [key]: raw })).toThrow(
      `${key} must be a non-negative whole number, got "${raw}"`,
    );
  });

  it("refuses an unknown log level", () => {
    expect(() => loadServerConfig({ LOG_LEVEL: "loud" })).toThrow(
      'LOG_LEVEL must be one of debug, info, warn, error, got "loud"',
    );
  });
});
