import { WebSocket, type RawData } from "ws";

import {
  ClientEventDecodeError,
  Disconnect,
  GameCommandInputError,
  LobbyNotFoundError,
  SerialQueue,
  commandFromEvent,
  decodeClientEvent,
  dispatchCommand,
  toProfileView,
  type CommandContext,
  type ConnectionId,
  type Logger,
  type PlayerChannel,
  type ServerEvent,
  type TimePoint,
} from "../core.js";

export const INTERNAL_ERROR_MESSAGE = "Internal server error";

export interface WebSocketGatewayOptions {
  readonly createContext: () => CommandContext;
  readonly dispatch?: typeof dispatchCommand;
  readonly logger?: Logger;
  readonly now?: () => TimePoint;
}

class SocketChannel implements PlayerChannel {
  constructor(private readonly socket: WebSocket) {}

  send(event: ServerEvent): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new Error("Socket is not open");
    }
    this.socket.send(JSON.stringify(event));
  }
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

function isClientFacing(
  error: unknown,
): error is ClientEventDecodeError | GameCommandInputError | LobbyNotFoundError {
  return (
    error instanceof ClientEventDecodeError ||
    error instanceof GameCommandInputError ||
    error instanceof LobbyNotFoundError
  );
}

/**
 * Binds WebSocket connections to the command layer. Messages from one socket
 * are handled strictly in arrival order; a failure is answered with an ERROR
 * event and never closes the connection.
 */
export class WebSocketGateway {
  readonly #createContext: () => CommandContext;
  readonly #dispatch: typeof dispatchCommand;
  readonly #logger: Logger | undefined;
  readonly #now: () => TimePoint;

  constructor(options: WebSocketGatewayOptions) {
    this.#createContext = options.createContext;
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#logger = options.logger;
    this.#now = options.now ?? Date.now;
  }

  /**
   * Registers the connection and sends WELCOME. Listeners go on before the
   * profile lookup so nothing the client sends early is lost.
   */
  attach(socket: WebSocket, username: string): Promise<ConnectionId> {
    const queue = new SerialQueue();
    const channel = new SocketChannel(socket);
    let connectionId: ConnectionId | undefined;

    const registered = queue.run(async () => {
      const { registry, profiles } = this.#createContext();
      const profile = await profiles.getProfile(username);
      const player = registry.register(channel, username, profile);
      connectionId = player.id;

      this.#logger?.info("WebSocket client attached", {
        connectionId: player.id,
        username,
        connections: registry.size,
      });

      channel.send({
        type: "WELCOME",
        payload: {
          player_id: player.id,
          handle: player.username,
          username,
          profile: toProfileView(profile),
        },
      });
      return player.id;
    });

    socket.on("message", (data: RawData) => {
      void queue.run(async () => {
        if (connectionId === undefined) return;
        await this.#handleMessage(connectionId, channel, rawDataToString(data));
      });
    });

    socket.on("close", () => {
      void queue.run(async () => {
        if (connectionId === undefined) return;
        await this.#handleClose(connectionId);
      });
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn("WebSocket client error", { connectionId, error });
    });

    return registered;
  }

  async #handleMessage(
    connectionId: ConnectionId,
    channel: PlayerChannel,
    raw: string,
  ): Promise<void> {
    try {
      const event = decodeClientEvent(raw);
      await this.#dispatch(commandFromEvent(event, connectionId, this.#now()), this.#createContext());
    } catch (error) {
      this.#reply(connectionId, channel, error);
    }
  }

  async #handleClose(connectionId: ConnectionId): Promise<void> {
    try {
      await this.#dispatch(new Disconnect(connectionId, this.#now()), this.#createContext());
    } catch (error) {
      this.#logger?.error("Failed to clean up closed connection", { connectionId, error });
    }
  }

  #reply(connectionId: ConnectionId, channel: PlayerChannel, error: unknown): void {
    let msg = INTERNAL_ERROR_MESSAGE;
    if (isClientFacing(error)) {
      msg = error.message;
      this.#logger?.warn("Rejected client event", { connectionId, msg });
    } else {
      this.#logger?.error("Unexpected error while handling client event", {
        connectionId,
        error,
      });
    }

    try {
      channel.send({ type: "ERROR", payload: { msg } });
    } catch (sendError) {
      this.#logger?.warn("Failed to deliver error reply", { connectionId, error: sendError });
    }
  }
}
