import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Context, Next } from "hono";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { RealScheduler } from "./adapters/RealScheduler.js";
import { UsernameIdentityProvider } from "./adapters/UsernameIdentityProvider.js";
import { WebSocketGateway } from "./adapters/WebSocketGateway.js";
import { createBackendApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import { ConnectionRegistry, InMemoryProfileStore, LobbyDirectory } from "./core.js";
import type { CommandContext, IdentityProvider } from "./core.js";
import { createConsoleLogger } from "./logger.js";

const WS_POLICY_VIOLATION = 1008;
const WS_INTERNAL_ERROR = 1011;

export async function startServer(): Promise<void> {
  const { port, logLevel, game: config } = loadServerConfig(process.env);
  const logger = createConsoleLogger("backend-local", { level: logLevel });
  const random = Math.random;

  const registry = new ConnectionRegistry();
  const lobbies = new LobbyDirectory({ config, random, logger });
  const profiles = new InMemoryProfileStore();
  const identity: IdentityProvider = new UsernameIdentityProvider();

  const scheduler = new RealScheduler({
    contextFactory: async (): Promise<CommandContext> => createContext(),
    logger,
  });

  function createContext(): CommandContext {
    return { registry, lobbies, scheduler, profiles, config, random, logger };
  }

  const gateway = new WebSocketGateway({ createContext, logger });
  const app = createBackendApp({ port, registry, lobbies, profiles, logger });
  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });
  const handshakeUsernames = new WeakMap<Request, string>();

  app.get(
    "/ws",
    async (c: Context, next: Next): Promise<Response | void> => {
      const username = await identity.resolve(new URL(c.req.url).searchParams);
      if (!username) {
        return c.json({ error: "A valid username is required" }, 401);
      }
      handshakeUsernames.set(c.req.raw, username);
      await next();
    },
    upgradeWebSocket((c: Context) => {
      const username = handshakeUsernames.get(c.req.raw);
      return {
        onOpen(_event: Event, ws: WSContext<WebSocket>): void {
          const rawSocket = ws.raw;
          if (username === undefined) {
            ws.close(WS_POLICY_VIOLATION, "Unidentified connection");
            return;
          }
          if (!rawSocket) {
            logger.warn("WebSocket connection missing raw handle", { username });
            ws.close(WS_POLICY_VIOLATION, "Unsupported transport");
            return;
          }
          gateway.attach(rawSocket, username).catch((error: unknown) => {
            logger.error("Failed to attach WebSocket client", { username, error });
            rawSocket.close(WS_INTERNAL_ERROR, "Could not register connection");
          });
        },
      };
    }),
  );

  const server = serve({ fetch: app.fetch, port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);
}

void startServer().catch((error) => {
  createConsoleLogger("backend-local").error("Failed to start backend", { error });
  process.exit(1);
});
