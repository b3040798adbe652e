export type {
  Command,
  CommandContext,
} from "@party-gauntlet/core/domain/commands/Command.js";
export { commandFromEvent } from "@party-gauntlet/core/domain/commands/commandFromEvent.js";
export { Disconnect } from "@party-gauntlet/core/domain/commands/Disconnect.js";
export { PhaseTimeout } from "@party-gauntlet/core/domain/commands/PhaseTimeout.js";
export { dispatchCommand } from "@party-gauntlet/core/domain/commands/dispatchCommand.js";
export { SerialQueue } from "@party-gauntlet/core/domain/concurrency/SerialQueue.js";
export {
  ClientEventDecodeError,
  GameCommandInputError,
  LobbyNotFoundError,
} from "@party-gauntlet/core/domain/errors/index.js";
export type { GameConfig, GameConfigOverrides } from "@party-gauntlet/core/domain/GameConfig.js";
export { createGameConfig } from "@party-gauntlet/core/domain/GameConfig.js";
export type { IdentityProvider } from "@party-gauntlet/core/domain/ports/IdentityProvider.js";
export type { Logger } from "@party-gauntlet/core/domain/ports/Logger.js";
export type { PlayerChannel } from "@party-gauntlet/core/domain/ports/PlayerChannel.js";
export type { ProfileStore } from "@party-gauntlet/core/domain/ports/ProfileStore.js";
export type { Scheduler } from "@party-gauntlet/core/domain/ports/Scheduler.js";
export { decodeClientEvent, USERNAME } from "@party-gauntlet/core/domain/protocol/ClientEvent.js";
export type { ServerEvent } from "@party-gauntlet/core/domain/protocol/ServerEvent.js";
export { toProfileView } from "@party-gauntlet/core/domain/protocol/ServerEvent.js";
export { ConnectionRegistry } from "@party-gauntlet/core/domain/services/ConnectionRegistry.js";
export { LobbyDirectory } from "@party-gauntlet/core/domain/services/LobbyDirectory.js";
export type {
  ConnectionId,
  LobbyCode,
  TimedPhase,
  TimePoint,
} from "@party-gauntlet/core/domain/typedefs.js";
export { InMemoryProfileStore } from "@party-gauntlet/core/adapters/in-memory/InMemoryProfileStore.js";
