import Fastify, { type FastifyInstance } from "fastify";
import cookie from "@fastify/cookie";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import websocket from "@fastify/websocket";
import { config } from "./config.js";
import { createAuthHooks } from "./lib/auth.js";
import { EditPresenceService } from "./lib/editPresenceService.js";
import { PresenceHub } from "./lib/presenceHub.js";
import type { SessionResolver } from "./lib/sessionStore.js";
import { WikiDatabase } from "./lib/sqliteStore.js";
import { VersioningEngine } from "./lib/versioningEngine.js";
import { registerHistoryRoutes } from "./routes/historyRoutes.js";
import { registerPageRoutes } from "./routes/pageRoutes.js";
import { registerPresenceRoutes } from "./routes/presenceRoutes.js";
import type { WikiLogger } from "./types.js";

export interface BuildAppOptions {
  /** An already opened database. When absent, `databaseFile` (or memory) is opened with the app's logger. */
  db?: WikiDatabase;
  databaseFile?: string;
  sessions: SessionResolver;
  editPresenceEnabled?: boolean;
  logLevel?: string;
}

export interface WikiApp {
  app: FastifyInstance;
  db: WikiDatabase;
  engine: VersioningEngine;
  presence: EditPresenceService;
  hub: PresenceHub;
}

const registerErrorHandler = (app: FastifyInstance): void => {
  app.setErrorHandler((error, request, reply) => {
    const statusCode =
      error instanceof Error && "statusCode" in error && typeof error.statusCode === "number" && error.statusCode >= 400
        ? error.statusCode
        : 500;

    if (statusCode >= 500) {
      request.log.error({ err: error, route: request.url, method: request.method }, "Unhandled request error");
    }

    if (reply.sent) return;

    const message = error instanceof Error && error.message ? error.message : "Request failed.";
    const safeMessage =
      statusCode === 503 ? "Storage is temporarily unavailable." : statusCode >= 500 ? "Internal server error." : message;
    void reply.code(statusCode).send({ ok: false, error: safeMessage });
  });
};

export const buildApp = async (options: BuildAppOptions): Promise<WikiApp> => {
  const app = Fastify({
    logger: { level: options.logLevel ?? config.logLevel },
    bodyLimit: 2 * 1024 * 1024,
    trustProxy: config.trustProxy
  });

  const logger: WikiLogger = {
    info: (obj, msg) => app.log.info(obj, msg),
    warn: (obj, msg) => app.log.warn(obj, msg),
    error: (obj, msg) => app.log.error(obj, msg)
  };

  const db =
    options.db ??
    (await WikiDatabase.open({ logger, ...(options.databaseFile ? { filePath: options.databaseFile } : {}) }));
  if (!options.db) {
    app.addHook("onClose", async () => {
      db.close();
    });
  }

  const engine = new VersioningEngine({ db, logger });
  const presence = new EditPresenceService({ db, logger });
  const hub = new PresenceHub({ presence, logger });
  const auth = createAuthHooks(options.sessions);

  await app.register(cookie, {
    secret: config.cookieSecret,
    hook: "onRequest"
  });

  await app.register(helmet, {
    hsts: config.isProduction
      ? {
          maxAge: 31536000,
          includeSubDomains: true
        }
      : false,
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
        baseUri: ["'none'"]
      }
    }
  });

  await app.register(rateLimit, {
    max: 120,
    timeWindow: "1 minute"
  });

  await app.register(websocket);

  app.addHook("preHandler", auth.attachCurrentUser);
  app.addHook("onClose", async () => {
    await hub.shutdown();
  });

  registerErrorHandler(app);

  app.get("/health", async () => ({ status: "ok", at: new Date().toISOString() }));
  await registerPageRoutes(app, { engine, auth });
  await registerHistoryRoutes(app, { engine, auth });
  await registerPresenceRoutes(app, {
    presence,
    hub,
    auth,
    enabled: options.editPresenceEnabled ?? config.editPresenceEnabled
  });

  return { app, db, engine, presence, hub };
};
