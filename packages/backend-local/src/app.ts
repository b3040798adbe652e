import { Hono } from "hono";
import type { Context, Next } from "hono";

import {
  USERNAME,
  toProfileView,
  type ConnectionRegistry,
  type LobbyDirectory,
  type Logger,
  type ProfileStore,
} from "./core.js";

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly registry: ConnectionRegistry;
  readonly lobbies: LobbyDirectory;
  readonly profiles: ProfileStore;
  readonly logger: Logger;
}

export function createBackendApp({
  port,
  registry,
  lobbies,
  profiles,
  logger,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({
      ok: true,
      timestamp: Date.now(),
      config: { port },
      connections: registry.size,
      lobbies: lobbies.size,
    }),
  );

  app.get("/api/lobbies", (c: Context) => c.json({ lobbies: lobbies.list() }));

  app.get("/api/lobbies/:code", (c) => {
    const code = c.req.param("code").toUpperCase();
    const lobby = lobbies.get(code);
    if (!lobby) {
      return c.json({ error: "Lobby not found" }, 404);
    }
    return c.json({ ...lobby.summary(), players: lobby.roster() });
  });

  app.get("/api/profile/:username", async (c) => {
    const username = c.req.param("username");
    if (!USERNAME.test(username)) {
      return c.json({ error: "Invalid username" }, 400);
    }

    try {
      const profile = await profiles.getProfile(username);
      return c.json(toProfileView(profile));
    } catch (error) {
      logger.error("Failed to load profile", { username, error });
      return c.json({ error: getErrorMessage(error) }, 500);
    }
  });

  return app;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
