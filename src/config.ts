import path from "node:path";
import dotenv from "dotenv";

const rootDir = process.cwd();

dotenv.config({
  path: path.join(rootDir, "config.env")
});

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  const normalized = (value ?? "").trim().toLowerCase();
  if (!normalized) return fallback;
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return fallback;
};

const LOG_LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const parseLogLevel = (value: string | undefined): string => {
  const normalized = (value ?? "").trim().toLowerCase();
  return LOG_LEVELS.has(normalized) ? normalized : "info";
};

const dataDir = path.resolve(rootDir, process.env.DATA_DIR ?? "data");

export const config = {
  rootDir,
  port: parsePositiveInt(process.env.PORT, 3000),
  host: process.env.HOST ?? "0.0.0.0",
  cookieSecret: process.env.COOKIE_SECRET ?? "dev-only-change-cookie-secret-please",
  isProduction: process.env.NODE_ENV === "production",
  trustProxy: parseBoolean(process.env.TRUST_PROXY, false),
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  editPresenceEnabled: parseBoolean(process.env.EDIT_PRESENCE_ENABLED, true),
  dataDir,
  databaseFile: path.join(dataDir, "wiki.sqlite"),
  sessionsFile: path.join(dataDir, "sessions.json")
};

if (config.cookieSecret === "dev-only-change-cookie-secret-please" && config.isProduction) {
  console.warn("[WARN] COOKIE_SECRET is not set. Set it before running in production.");
}
