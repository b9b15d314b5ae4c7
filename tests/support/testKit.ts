import { EditPresenceService } from "../../src/lib/editPresenceService.js";
import type { PresenceSocket } from "../../src/lib/presenceHub.js";
import { WikiDatabase } from "../../src/lib/sqliteStore.js";
import { VersioningEngine } from "../../src/lib/versioningEngine.js";
import type { WikiLogger } from "../../src/types.js";

export interface LogEntry {
  level: "info" | "warn" | "error";
  msg: string;
  obj: Record<string, unknown>;
}

export const createRecordingLogger = (): WikiLogger & { entries: LogEntry[] } => {
  const entries: LogEntry[] = [];
  return {
    entries,
    info: (obj, msg) => entries.push({ level: "info", msg, obj }),
    warn: (obj, msg) => entries.push({ level: "warn", msg, obj }),
    error: (obj, msg) => entries.push({ level: "error", msg, obj })
  };
};

export const openMemoryDatabase = (logger: WikiLogger = createRecordingLogger()): Promise<WikiDatabase> =>
  WikiDatabase.open({ logger });

/** A clock that only moves when told to. */
export const createManualClock = (startIso = "2024-05-01T10:00:00.000Z") => {
  let current = Date.parse(startIso);
  return {
    now: (): number => current,
    date: (): Date => new Date(current),
    advance: (ms: number): void => {
      current += ms;
    }
  };
};

export const createEngine = async (clock = createManualClock()) => {
  const logger = createRecordingLogger();
  const db = await openMemoryDatabase(logger);
  const engine = new VersioningEngine({ db, logger, now: clock.date });
  return { db, engine, logger, clock };
};

export const createPresence = async (clock = createManualClock()) => {
  const logger = createRecordingLogger();
  const db = await openMemoryDatabase(logger);
  let counter = 0;
  const presence = new EditPresenceService({
    db,
    logger,
    now: clock.now,
    generateSessionId: () => {
      counter += 1;
      return `session-${counter}`;
    }
  });
  return { db, presence, logger, clock };
};

export class FakeSocket implements PresenceSocket {
  readyState = 1;
  readonly sent: string[] = [];
  closedWith: { code: number | undefined; reason: string | undefined } | null = null;
  failSends = false;

  send(data: string): void {
    if (this.failSends) {
      throw new Error("socket write failed");
    }
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
    this.readyState = 3;
  }

  messages(): unknown[] {
    return this.sent.map((entry) => JSON.parse(entry));
  }

  lastMessage(): unknown {
    const last = this.sent[this.sent.length - 1];
    return last === undefined ? undefined : JSON.parse(last);
  }
}
