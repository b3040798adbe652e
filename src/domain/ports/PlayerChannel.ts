import type { ServerEvent } from "../protocol/ServerEvent.js";

/**
 * Outbound half of one player's transport connection.
 * `send` may throw when the underlying socket is already gone.
 */
export interface PlayerChannel {
  send(event: ServerEvent): void;
}
