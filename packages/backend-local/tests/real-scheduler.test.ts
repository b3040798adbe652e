import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { RealScheduler } from "../src/adapters/RealScheduler.js";
import { PhaseTimeout, type CommandContext, type dispatchCommand } from "../src/core.js";
import { createLoggerMock, createTestContext } from "./support/testContext.js";

function createScheduler() {
  const context = createTestContext();
  const logger = createLoggerMock();
  const dispatch = vi.fn<typeof dispatchCommand>().mockResolvedValue(undefined);
  const contextFactory = vi.fn<() => Promise<CommandContext>>().mockResolvedValue(context);
  const scheduler = new RealScheduler({ contextFactory, dispatch, logger });
  return { scheduler, dispatch, contextFactory, context, logger };
}

describe("RealScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000);
  });

  afterEach(() => {
    vi.clearAllTimers();
    vi.useRealTimers();
  });

  it("dispatches a PhaseTimeout once the delay has passed", async () => {
    const { scheduler, dispatch, contextFactory, context } = createScheduler();

    await scheduler.scheduleTimeout("ABCDEF", "round", 2, 5_000);
    await vi.advanceTimersByTimeAsync(4_999);

    expect(contextFactory).not.toHaveBeenCalled();
    expect(scheduler.pendingCount).toBe(1);

    await vi.advanceTimersByTimeAsync(1);

    expect(contextFactory).toHaveBeenCalledTimes(1);
    expect(dispatch).toHaveBeenCalledTimes(1);
    const [command, providedContext] = dispatch.mock.calls[0] ?? [];
    expect(providedContext).toBe(context);
    expect(command).toBeInstanceOf(PhaseTimeout);
    expect(command).toEqual(new PhaseTimeout("ABCDEF", "round", 2, 6_000));
    expect(scheduler.pendingCount).toBe(0);
  });

  it("replaces a pending timeout for the same lobby phase", async () => {
    const { scheduler, dispatch, logger } = createScheduler();

    await scheduler.scheduleTimeout("ABCDEF", "preview", 1, 5_000);
    await scheduler.scheduleTimeout("ABCDEF", "preview", 2, 3_000);
    await vi.advanceTimersByTimeAsync(10_000);

    expect(logger.warn).toHaveBeenCalledWith("Rescheduling timeout", {
      lobbyCode: "ABCDEF",
      phase: "preview",
      roundNumber: 2,
      delayMs: 3_000,
    });
    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch.mock.calls[0]?.[0]).toEqual(new PhaseTimeout("ABCDEF", "preview", 2, 4_000));
  });

  it("cancels every timer of one lobby", async () => {
    const { scheduler, dispatch } = createScheduler();

    await scheduler.scheduleTimeout("ABCDEF", "preview", 1, 5_000);
    await scheduler.scheduleTimeout("ABCDEF", "round", 1, 6_000);
    await scheduler.scheduleTimeout("GHJKLM", "preview", 1, 5_000);
    scheduler.cancelLobby("ABCDEF");

    expect(scheduler.pendingCount).toBe(1);
    await vi.advanceTimersByTimeAsync(10_000);

    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch.mock.calls[0]?.[0]).toMatchObject({ lobbyCode: "GHJKLM", phase: "preview" });
  });

  it("logs a timeout that fails to dispatch", async () => {
    const { scheduler, dispatch, logger } = createScheduler();
    const failure = new Error("boom");
    dispatch.mockRejectedValueOnce(failure);

    await scheduler.scheduleTimeout("ABCDEF", "intermission", 1, 100);
    await vi.advanceTimersByTimeAsync(100);

    expect(logger.error).toHaveBeenCalledWith("Failed to dispatch scheduled timeout", {
      lobbyCode: "ABCDEF",
      phase: "intermission",
      roundNumber: 1,
      error: failure,
    });
  });

  it("rejects a negative delay", async () => {
    const { scheduler } = createScheduler();

    await expect(scheduler.scheduleTimeout("ABCDEF", "round", 1, -1)).rejects.toThrow(
      "Timeout delay must be non-negative",
    );
    expect(scheduler.pendingCount).toBe(0);
  });
});
