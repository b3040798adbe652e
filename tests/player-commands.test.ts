import { describe, expect, it, vi } from "vitest";

import { CreateLobby } from "../src/domain/commands/CreateLobby.js";
import { Disconnect } from "../src/domain/commands/Disconnect.js";
import { JoinLobby } from "../src/domain/commands/JoinLobby.js";
import { PhaseTimeout } from "../src/domain/commands/PhaseTimeout.js";
import { SendChat } from "../src/domain/commands/SendChat.js";
import { StartGame } from "../src/domain/commands/StartGame.js";
import { SubmitMinigameInput } from "../src/domain/commands/SubmitMinigameInput.js";
import { ToggleReady } from "../src/domain/commands/ToggleReady.js";
import { UpdateProfile } from "../src/domain/commands/UpdateProfile.js";
import { commandFromEvent } from "../src/domain/commands/commandFromEvent.js";
import { createGameConfig } from "../src/domain/GameConfig.js";
import { openLobby } from "./support/lobbies.js";
import { connect, createCommandContext, createLoggerMock } from "./support/mocks.js";

describe("ToggleReady command", () => {
  it("flips the flag and shows it on the roster", async () => {
    const ctx = createCommandContext();
    const { seat } = await openLobby(ctx, ["ann", "ben"]);

    await new ToggleReady(seat("ben").player.id, 0).execute(ctx);
    expect(seat("ann").channel.last("ROSTER_UPDATE")?.players.map((p) => p.is_ready)).toEqual([
      false,
      true,
    ]);

    await new ToggleReady(seat("ben").player.id, 0).execute(ctx);
    expect(seat("ben").player.isReady).toBe(false);
  });

  it("is locked while a tournament runs", async () => {
    const ctx = createCommandContext();
    const { seat } = await openLobby(ctx, ["ann", "ben"], { ready: true });
    await new StartGame(seat("ann").player.id, false, 0).execute(ctx);

    await expect(new ToggleReady(seat("ben").player.id, 0).execute(ctx)).rejects.toThrow(
      "A tournament is already in progress",
    );
  });
});

describe("UpdateProfile command", () => {
  it("acknowledges and stores the new look", async () => {
    const ctx = createCommandContext();
    const { player, channel } = connect(ctx, "ann");

    await new UpdateProfile(
      player.id,
      { color: "#ff0000", shape: "star", username: undefined },
      0,
    ).execute(ctx);

    expect(channel.events).toEqual([
      { type: "PROFILE_ACK", payload: { username: "ann", color: "#ff0000", shape: "star" } },
    ]);
    expect(await ctx.profiles.getProfile("ann")).toMatchObject({ color: "#ff0000", shape: "star" });
  });

  it("refuses to change the username", async () => {
    const ctx = createCommandContext();
    const { player, channel } = connect(ctx, "ann");

    await expect(
      new UpdateProfile(
        player.id,
        { color: "#ff0000", shape: undefined, username: "annie" },
        0,
      ).execute(ctx),
    ).rejects.toThrow("Your username is set at login and cannot be changed");
    expect(player.username).toBe("ann");
    expect(player.color).toBe("#4a148c");
    expect(channel.events).toEqual([]);
  });

  it("does not let a newcomer take over another player's seat", async () => {
    const ctx = createCommandContext();
    const { lobby, seat } = await openLobby(ctx, ["ann", "ben", "cat"], { ready: true });
    await new StartGame(seat("ann").player.id, false, 0).execute(ctx);
    await new PhaseTimeout("ABCDEF", "preview", 1, 5_000).execute(ctx);
    await new SubmitMinigameInput(
      seat("ben").player.id,
      { type: "SUBMIT_ANSWER", answer: 2 },
      6_000,
    ).execute(ctx);
    await new Disconnect(seat("ben").player.id, 7_000).execute(ctx);
    await new Disconnect(seat("ann").player.id, 7_000).execute(ctx);

    const eve = connect(ctx, "eve").player;
    await expect(
      new UpdateProfile(
        eve.id,
        { color: undefined, shape: undefined, username: "ben" },
        8_000,
      ).execute(ctx),
    ).rejects.toThrow("Your username is set at login and cannot be changed");
    await new JoinLobby(eve.id, "ABCDEF", 8_000).execute(ctx);

    const mallory = connect(ctx, "mallory").player;
    await expect(
      new UpdateProfile(
        mallory.id,
        { color: undefined, shape: undefined, username: "ann" },
        9_000,
      ).execute(ctx),
    ).rejects.toThrow("Your username is set at login and cannot be changed");
    await new JoinLobby(mallory.id, "ABCDEF", 9_000).execute(ctx);

    expect(lobby.getParticipant("ben")).toMatchObject({ score: 1, connectionId: undefined });
    expect(lobby.getParticipant("eve")).toMatchObject({ score: 0, connectionId: eve.id });
    expect(lobby.isActivePlayer("eve")).toBe(false);
    expect(lobby.isActivePlayer("ben")).toBe(true);
    expect(mallory.isHost).toBe(false);
    expect(lobby.hostHandle).toBe("ann");
  });

  it("acknowledges only after the profile is stored", async () => {
    const ctx = createCommandContext();
    const { player, channel } = connect(ctx, "ann");
    const failure = new Error("profile store down");
    vi.spyOn(ctx.profiles, "updateProfile").mockRejectedValue(failure);

    await expect(
      new UpdateProfile(
        player.id,
        { color: "#ff0000", shape: undefined, username: undefined },
        0,
      ).execute(ctx),
    ).rejects.toBe(failure);
    expect(channel.events).toEqual([]);
    expect(player.color).toBe("#4a148c");
  });

  it("shows a new colour to the lobby", async () => {
    const ctx = createCommandContext();
    const { seat } = await openLobby(ctx, ["ann", "ben"]);

    await new UpdateProfile(
      seat("ben").player.id,
      { color: "#00ff00", shape: undefined, username: "ben" },
      0,
    ).execute(ctx);

    expect(seat("ann").channel.last("ROSTER_UPDATE")?.players.map((p) => p.color)).toEqual([
      "#4a148c",
      "#00ff00",
    ]);
  });
});

describe("SendChat command", () => {
  it("trims the message and sends it to the whole lobby", async () => {
    const ctx = createCommandContext();
    const { seat } = await openLobby(ctx, ["ann", "ben"]);

    await new SendChat(seat("ann").player.id, "  good luck  ", 0).execute(ctx);

    const chat = { sender: "ann", text: "good luck" };
    expect(seat("ann").channel.ofType("CHAT_INCOMING")).toEqual([chat]);
    expect(seat("ben").channel.ofType("CHAT_INCOMING")).toEqual([chat]);
  });

  it("cuts long messages", async () => {
    const ctx = createCommandContext({ config: createGameConfig({ chatMessageMaxLength: 5 }) });
    const { seat } = await openLobby(ctx, ["ann"]);

    await new SendChat(seat("ann").player.id, "abcdefgh", 0).execute(ctx);

    expect(seat("ann").channel.last("CHAT_INCOMING")).toEqual({ sender: "ann", text: "abcde" });
  });

  it("rejects a blank message", async () => {
    const ctx = createCommandContext();
    const { seat } = await openLobby(ctx, ["ann"]);

    await expect(new SendChat(seat("ann").player.id, "   ", 0).execute(ctx)).rejects.toThrow(
      "Message cannot be empty",
    );
  });
});

describe("SubmitMinigameInput command", () => {
  it("drops input while no round is running", async () => {
    const logger = createLoggerMock();
    const ctx = createCommandContext({ logger });
    const { seat } = await openLobby(ctx, ["ann", "ben"]);
    seat("ann").channel.clear();

    await new SubmitMinigameInput(
      seat("ann").player.id,
      { type: "SUBMIT_ANSWER", answer: 2 },
      0,
    ).execute(ctx);

    expect(seat("ann").channel.events).toEqual([]);
    expect(logger.debug).toHaveBeenCalledWith("Input dropped; no round running", {
      lobbyCode: "ABCDEF",
      input: "SUBMIT_ANSWER",
    });
  });

  it("drops input from a player outside any lobby", async () => {
    const ctx = createCommandContext();
    const { player, channel } = connect(ctx, "ann");

    await new SubmitMinigameInput(player.id, { type: "SUBMIT_ANSWER", answer: 2 }, 0).execute(ctx);

    expect(channel.events).toEqual([]);
  });
});

describe("commandFromEvent", () => {
  it("maps each client event to its command", () => {
    const at = 42;

    expect(commandFromEvent({ type: "CREATE_LOBBY", capacity: 8 }, "conn-1", at)).toEqual(
      new CreateLobby("conn-1", 8, at),
    );
    expect(commandFromEvent({ type: "JOIN_LOBBY", lobbyId: "ABCDEF" }, "conn-1", at)).toEqual(
      new JoinLobby("conn-1", "ABCDEF", at),
    );
    expect(commandFromEvent({ type: "TOGGLE_READY" }, "conn-1", at)).toBeInstanceOf(ToggleReady);
    expect(commandFromEvent({ type: "START_GAME", testMode: true }, "conn-1", at)).toEqual(
      new StartGame("conn-1", true, at),
    );
    expect(commandFromEvent({ type: "CHAT_MESSAGE", message: "hi" }, "conn-1", at)).toEqual(
      new SendChat("conn-1", "hi", at),
    );

    const input = { type: "SUBMIT_WORD", currentWord: "anchor", typedWord: "anchor" } as const;
    expect(commandFromEvent(input, "conn-1", at)).toEqual(new SubmitMinigameInput("conn-1", input, at));
  });
});
