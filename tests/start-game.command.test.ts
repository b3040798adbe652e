import { describe, expect, it } from "vitest";

import { StartGame } from "../src/domain/commands/StartGame.js";
import { ToggleReady } from "../src/domain/commands/ToggleReady.js";
import { GameCommandInputError } from "../src/domain/errors/GameCommandInputError.js";
import { createGameConfig } from "../src/domain/GameConfig.js";
import { openLobby } from "./support/lobbies.js";
import { createCommandContext, createLoggerMock } from "./support/mocks.js";

describe("StartGame command", () => {
  it("moves a ready lobby into the first preview", async () => {
    const ctx = createCommandContext();
    const { lobby, seat } = await openLobby(ctx, ["ann", "ben"], { ready: true });

    await new StartGame(seat("ann").player.id, false, 1_000).execute(ctx);

    const preview = {
      game_number: 1,
      game_info: {
        name: "Math Quiz",
        description: "Solve as many sums as you can. Every right answer is a point.",
        duration: 20,
      },
      round_number: 1,
    };
    expect(seat("ann").channel.ofType("GAME_PREVIEW")).toEqual([preview]);
    expect(seat("ben").channel.ofType("GAME_PREVIEW")).toEqual([preview]);
    expect(lobby.phase).toBe("preview");
    expect(lobby.roundNumber).toBe(1);
    expect(lobby.activePlayers).toEqual(["ann", "ben"]);
    expect(lobby.gameHistory).toEqual([1]);
    expect(ctx.scheduler.scheduleTimeout).toHaveBeenCalledWith("ABCDEF", "preview", 1, 5_000);
  });

  it("only lets the host start", async () => {
    const ctx = createCommandContext();
    const { seat } = await openLobby(ctx, ["ann", "ben"], { ready: true });

    await expect(new StartGame(seat("ben").player.id, false, 0).execute(ctx)).rejects.toThrow(
      "Only the host can start the game",
    );
    expect(ctx.scheduler.scheduleTimeout).not.toHaveBeenCalled();
  });

  it("needs enough players", async () => {
    const ctx = createCommandContext();
    const { seat } = await openLobby(ctx, ["ann"], { ready: true });

    await expect(new StartGame(seat("ann").player.id, false, 0).execute(ctx)).rejects.toThrow(
      "At least 2 players are needed to start",
    );
  });

  it("needs every player ready", async () => {
    const ctx = createCommandContext();
    const { lobby, seat } = await openLobby(ctx, ["ann", "ben"]);
    await new ToggleReady(seat("ann").player.id, 0).execute(ctx);

    await expect(new StartGame(seat("ann").player.id, false, 0).execute(ctx)).rejects.toThrow(
      "All players must be ready",
    );
    expect(lobby.phase).toBe("lobby");
  });

  it("lists every unmet requirement", async () => {
    const ctx = createCommandContext();
    const { seat } = await openLobby(ctx, ["ann"]);

    const starting = new StartGame(seat("ann").player.id, false, 0).execute(ctx);

    await expect(starting).rejects.toBeInstanceOf(GameCommandInputError);
    await expect(starting).rejects.toThrow(
      "Invalid game command input: At least 2 players are needed to start; All players must be ready",
    );
  });

  it("refuses test mode unless the server allows it", async () => {
    const ctx = createCommandContext();
    const { seat } = await openLobby(ctx, ["ann"]);

    await expect(new StartGame(seat("ann").player.id, true, 0).execute(ctx)).rejects.toThrow(
      "Test mode is disabled on this server",
    );
  });

  it("skips the ready checks in allowed test mode", async () => {
    const logger = createLoggerMock();
    const ctx = createCommandContext({ config: createGameConfig({ allowTestMode: true }), logger });
    const { lobby, seat } = await openLobby(ctx, ["ann"]);

    await new StartGame(seat("ann").player.id, true, 0).execute(ctx);

    expect(lobby.phase).toBe("preview");
    expect(lobby.activePlayers).toEqual(["ann"]);
    expect(logger.warn).toHaveBeenCalledWith("Starting tournament in test mode", {
      type: "StartGame",
      lobbyCode: "ABCDEF",
    });
  });

  it("refuses to start twice", async () => {
    const ctx = createCommandContext();
    const { seat } = await openLobby(ctx, ["ann", "ben"], { ready: true });
    await new StartGame(seat("ann").player.id, false, 0).execute(ctx);

    await expect(new StartGame(seat("ann").player.id, false, 0).execute(ctx)).rejects.toThrow(
      "A tournament is already in progress",
    );
    expect(ctx.scheduler.scheduleTimeout).toHaveBeenCalledTimes(1);
  });
});
