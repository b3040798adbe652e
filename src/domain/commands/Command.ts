import type { GameConfig } from "../GameConfig.js";
import type { Logger } from "../ports/Logger.js";
import type { ProfileStore } from "../ports/ProfileStore.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { ConnectionRegistry } from "../services/ConnectionRegistry.js";
import type { LobbyDirectory } from "../services/LobbyDirectory.js";
import type { RandomSource, TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly registry: ConnectionRegistry;
  readonly lobbies: LobbyDirectory;
  readonly scheduler: Scheduler;
  readonly profiles: ProfileStore;
  readonly config: GameConfig;
  readonly random: RandomSource;
  readonly logger?: Logger;
}

export abstract class Command {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<void>;
}
