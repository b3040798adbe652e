import { vi, type Mock } from "vitest";

import { InMemoryProfileStore } from "../../src/adapters/in-memory/InMemoryProfileStore.js";
import type { CommandContext } from "../../src/domain/commands/Command.js";
import type { Player } from "../../src/domain/entities/Player.js";
import { createGameConfig, type GameConfig } from "../../src/domain/GameConfig.js";
import type { Logger } from "../../src/domain/ports/Logger.js";
import type { PlayerChannel } from "../../src/domain/ports/PlayerChannel.js";
import type { Scheduler } from "../../src/domain/ports/Scheduler.js";
import type { ServerEvent } from "../../src/domain/protocol/ServerEvent.js";
import { ConnectionRegistry } from "../../src/domain/services/ConnectionRegistry.js";
import { LobbyDirectory } from "../../src/domain/services/LobbyDirectory.js";
import type { RandomSource } from "../../src/domain/typedefs.js";

export type EventType = ServerEvent["type"];
export type EventOf<T extends EventType> = Extract<ServerEvent, { readonly type: T }>;

/** Channel that keeps everything sent to it. */
export class RecordingChannel implements PlayerChannel {
  readonly events: ServerEvent[] = [];

  send(event: ServerEvent): void {
    this.events.push(event);
  }

  ofType<T extends EventType>(type: T): EventOf<T>["payload"][] {
    return this.events
      .filter((event): event is EventOf<T> => event.type === type)
      .map((event) => event.payload);
  }

  last<T extends EventType>(type: T): EventOf<T>["payload"] | undefined {
    return this.ofType(type).at(-1);
  }

  types(): EventType[] {
    return this.events.map((event) => event.type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

export class FailingChannel implements PlayerChannel {
  send(): void {
    throw new Error("socket closed");
  }
}

export interface SchedulerMock extends Scheduler {
  readonly scheduleTimeout: Mock<Scheduler["scheduleTimeout"]>;
  readonly cancelLobby: Mock<Scheduler["cancelLobby"]>;
}

export function createSchedulerMock(): SchedulerMock {
  return {
    scheduleTimeout: vi.fn<Scheduler["scheduleTimeout"]>(),
    cancelLobby: vi.fn<Scheduler["cancelLobby"]>(),
  };
}

export interface LoggerMock extends Logger {
  readonly info: Mock<Logger["info"]>;
  readonly warn: Mock<Logger["warn"]>;
  readonly error: Mock<Logger["error"]>;
  readonly debug: Mock<Logger["debug"]>;
}

export function createLoggerMock(): LoggerMock {
  return {
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    debug: vi.fn<Logger["debug"]>(),
  };
}

/** Returns the scripted values in order, then `fallback` forever. */
export function scriptedRandom(values: readonly number[], fallback = 0): RandomSource {
  let index = 0;
  return () => {
    const value = values[index];
    index += 1;
    return value ?? fallback;
  };
}

/** Cycles through `values` forever. */
export function cyclingRandom(values: readonly number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index += 1;
    return value;
  };
}

/**
 * Walks the lobby code alphabet one character per call, so consecutive
 * lobbies get ABCDEF, GHJKLM, ...
 */
export function lobbyCodeRandom(): RandomSource {
  let step = 0;
  return () => {
    const value = (step % 32) / 32;
    step += 1;
    return value;
  };
}

export interface CommandContextOverrides {
  readonly config?: GameConfig;
  readonly random?: RandomSource;
  readonly scheduler?: Scheduler;
  readonly logger?: Logger;
}

export interface CommandContextMock extends CommandContext {
  readonly registry: ConnectionRegistry;
  readonly lobbies: LobbyDirectory;
  readonly profiles: InMemoryProfileStore;
  readonly config: GameConfig;
}

export interface CommandContextWithSchedulerMock extends CommandContextMock {
  readonly scheduler: SchedulerMock;
}

export function createCommandContext(
  overrides: CommandContextOverrides & { readonly scheduler: Scheduler },
): CommandContextMock;
export function createCommandContext(
  overrides?: Omit<CommandContextOverrides, "scheduler">,
): CommandContextWithSchedulerMock;
export function createCommandContext(
  overrides: CommandContextOverrides = {},
): CommandContextMock {
  const config = overrides.config ?? createGameConfig();

  return {
    registry: new ConnectionRegistry(),
    lobbies: new LobbyDirectory({ config, random: lobbyCodeRandom(), logger: overrides.logger }),
    scheduler: overrides.scheduler ?? createSchedulerMock(),
    profiles: new InMemoryProfileStore(),
    config,
    random: overrides.random ?? (() => 0),
    ...(overrides.logger !== undefined ? { logger: overrides.logger } : {}),
  } satisfies CommandContextMock;
}

export interface ConnectedPlayer {
  readonly player: Player;
  readonly channel: RecordingChannel;
}

export function connect(ctx: Pick<CommandContext, "registry">, username: string): ConnectedPlayer {
  const channel = new RecordingChannel();
  const player = ctx.registry.register(channel, username);
  return { player, channel };
}
