import { describe, it, expect } from "vitest";

import { InMemoryScheduler } from "../src/adapters/in-memory/InMemoryScheduler";
import type { PhaseTimeout } from "../src/domain/commands/PhaseTimeout";

describe("InMemoryScheduler", () => {
  it("dispatches commands once their delay elapses", async () => {
    const dispatched: PhaseTimeout[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    });

    await scheduler.scheduleTimeout("ABCDEF", "preview", 1, 2_000);

    await scheduler.runFor(1_000);
    expect(dispatched).toEqual([]);

    await scheduler.runFor(1_000);
    expect(dispatched).toHaveLength(1);
    expect(dispatched[0]?.type).toBe("PhaseTimeout");
    expect(dispatched[0]?.lobbyCode).toBe("ABCDEF");
    expect(dispatched[0]?.phase).toBe("preview");
    expect(dispatched[0]?.roundNumber).toBe(1);
    expect(dispatched[0]?.at).toBe(2_000);
  });

  it("delivers timeouts in the order they are scheduled to fire", async () => {
    const dispatched: PhaseTimeout[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    });

    await scheduler.scheduleTimeout("ABCDEF", "round", 1, 1_500);
    await scheduler.scheduleTimeout("GHJKLM", "round", 1, 500);

    await scheduler.runFor(1_500);
    expect(dispatched.map((command) => [command.lobbyCode, command.at])).toEqual([
      ["GHJKLM", 500],
      ["ABCDEF", 1_500],
    ]);
  });

  it("replaces a pending timeout for the same lobby phase", async () => {
    const dispatched: PhaseTimeout[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    });

    await scheduler.scheduleTimeout("ABCDEF", "round", 1, 500);
    await scheduler.scheduleTimeout("ABCDEF", "round", 2, 1_000);

    await scheduler.runFor(2_000);
    expect(dispatched.map((command) => command.roundNumber)).toEqual([2]);
  });

  it("drops every timeout of a cancelled lobby", async () => {
    const dispatched: PhaseTimeout[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    });

    await scheduler.scheduleTimeout("ABCDEF", "preview", 1, 500);
    await scheduler.scheduleTimeout("ABCDEF", "intermission", 1, 700);
    await scheduler.scheduleTimeout("GHJKLM", "preview", 1, 900);
    scheduler.cancelLobby("ABCDEF");

    await scheduler.runFor(1_000);
    expect(dispatched.map((command) => command.lobbyCode)).toEqual(["GHJKLM"]);
    expect(scheduler.pending).toEqual([]);
  });

  it("processes follow-up timeouts scheduled during dispatch", async () => {
    const dispatched: string[] = [];
    const scheduler = new InMemoryScheduler(async (command) => {
      dispatched.push(`${command.phase}-${command.at}`);
      await scheduler.scheduleTimeout("ABCDEF", command.phase, command.roundNumber, 500);
    });

    await scheduler.scheduleTimeout("ABCDEF", "round", 1, 1_000);

    await scheduler.runFor(2_000);
    expect(dispatched).toEqual(["round-1000", "round-1500", "round-2000"]);
    expect(scheduler.now).toBe(2_000);
  });
});
