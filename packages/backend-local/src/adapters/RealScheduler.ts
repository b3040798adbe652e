/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { CommandContext, LobbyCode, Logger, Scheduler, TimedPhase } from "../core.js";
import { PhaseTimeout, dispatchCommand } from "../core.js";

interface RealSchedulerOptions {
  readonly dispatch?: typeof dispatchCommand;
  readonly contextFactory: () => Promise<CommandContext>;
  readonly logger?: Logger;
}

type TimeoutKey = `${LobbyCode}:${TimedPhase}`;

export class RealScheduler implements Scheduler {
  #timers: Map<TimeoutKey, ReturnType<typeof setTimeout>> = new Map();
  readonly #dispatch: typeof dispatchCommand;
  readonly #contextFactory: RealSchedulerOptions["contextFactory"];
  readonly #logger: Logger | undefined;

  constructor(options: RealSchedulerOptions) {
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#contextFactory = options.contextFactory;
    this.#logger = options.logger;
  }

  get pendingCount(): number {
    return this.#timers.size;
  }

  async scheduleTimeout(
    lobbyCode: LobbyCode,
    phase: TimedPhase,
    roundNumber: number,
    delayMs: number,
  ): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const key = this.#toKey(lobbyCode, phase);
    const existing = this.#timers.get(key);
    if (existing) {
      clearTimeout(existing);
      this.#timers.delete(key);
      this.#logger?.warn("Rescheduling timeout", { lobbyCode, phase, roundNumber, delayMs });
    }

    const timer = setTimeout(async () => {
      this.#timers.delete(key);
      try {
        const context = await this.#contextFactory();
        await this.#dispatch(new PhaseTimeout(lobbyCode, phase, roundNumber, Date.now()), context);
      } catch (error) {
        this.#logger?.error("Failed to dispatch scheduled timeout", {
          lobbyCode,
          phase,
          roundNumber,
          error,
        });
      }
    }, delayMs);

    this.#timers.set(key, timer);
    this.#logger?.debug("Timeout scheduled", { lobbyCode, phase, roundNumber, delayMs });
  }

  cancelLobby(lobbyCode: LobbyCode): void {
    for (const [key, timer] of [...this.#timers]) {
      if (key.startsWith(`${lobbyCode}:`)) {
        clearTimeout(timer);
        this.#timers.delete(key);
      }
    }
  }

  #toKey(lobbyCode: LobbyCode, phase: TimedPhase): TimeoutKey {
    return `${lobbyCode}:${phase}`;
  }
}
