import type { CurrentUser } from "../types.js";
import { readJsonFile } from "./fileStore.js";

const CACHE_TTL_MS = 5_000;

/** Session rows as the external auth service writes them. */
export interface SessionRecord {
  id: string;
  userId: string;
  username: string;
  isAdmin?: boolean;
  disabled?: boolean;
  expiresAt: string;
}

export interface SessionResolver {
  resolve(sessionId: string): Promise<CurrentUser | null>;
}

const isSessionRecord = (value: unknown): value is SessionRecord => {
  if (!value || typeof value !== "object") return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.id === "string" &&
    typeof candidate.userId === "string" &&
    typeof candidate.username === "string" &&
    typeof candidate.expiresAt === "string" &&
    (candidate.isAdmin === undefined || typeof candidate.isAdmin === "boolean") &&
    (candidate.disabled === undefined || typeof candidate.disabled === "boolean")
  );
};

const isExpired = (session: SessionRecord, nowMs: number): boolean => {
  const expiresAtMs = Date.parse(session.expiresAt);
  return !Number.isFinite(expiresAtMs) || expiresAtMs <= nowMs;
};

export const toCurrentUser = (session: SessionRecord): CurrentUser => ({
  id: session.userId,
  username: session.username,
  isAdmin: session.isAdmin === true
});

/** Looks sessions up in a JSON file, re-reading it at most every few seconds. */
export const createFileSessionResolver = (filePath: string, now: () => number = Date.now): SessionResolver => {
  let cached: Map<string, SessionRecord> | null = null;
  let loadedAt = 0;

  const loadSessions = async (): Promise<Map<string, SessionRecord>> => {
    if (cached && now() - loadedAt < CACHE_TTL_MS) return cached;

    const raw = await readJsonFile(filePath, []);
    const records = Array.isArray(raw) ? raw.filter(isSessionRecord) : [];
    cached = new Map(records.map((record) => [record.id, record]));
    loadedAt = now();
    return cached;
  };

  return {
    async resolve(sessionId) {
      const session = (await loadSessions()).get(sessionId);
      if (!session || session.disabled === true || isExpired(session, now())) return null;
      return toCurrentUser(session);
    }
  };
};
