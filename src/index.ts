import { buildApp } from "./app.js";
import { config } from "./config.js";
import { ensureDir } from "./lib/fileStore.js";
import { createFileSessionResolver } from "./lib/sessionStore.js";

const PRESENCE_PURGE_INTERVAL_MS = 10 * 60 * 1000;

const start = async (): Promise<void> => {
  await ensureDir(config.dataDir);

  const { app, presence } = await buildApp({
    databaseFile: config.databaseFile,
    sessions: createFileSessionResolver(config.sessionsFile)
  });

  try {
    const purged = await presence.purgeExpired();
    app.log.info({ purged }, "Expired edit sessions removed at startup");
    setInterval(() => {
      void presence.purgeExpired().catch((error) => app.log.error(error, "Failed to purge expired edit sessions"));
    }, PRESENCE_PURGE_INTERVAL_MS).unref();

    const shutdown = (): void => {
      void app.close().then(
        () => process.exit(0),
        (error) => {
          app.log.error(error, "Shutdown failed");
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    await app.listen({
      port: config.port,
      host: config.host
    });

    app.log.info(`branchwiki listening on http://${config.host}:${config.port}`);
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
};

void start().catch((error) => {
  console.error("[ERROR] Startup failed", error);
  process.exit(1);
});
