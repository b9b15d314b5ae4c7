import { createRequire } from "node:module";
import type { BindParams, Database, ParamsObject, SqlJsStatic, SqlValue } from "sql.js";
import type { WikiLogger } from "../types.js";
import { PersistenceError, StorageUnavailableError, errorMessage } from "./errors.js";
import { quarantineFile, readBinaryFile, writeBinaryFileAtomic } from "./fileStore.js";

type SqlJsInit = (config?: { locateFile?: (file: string) => string }) => Promise<SqlJsStatic>;

export type SqlRow = ParamsObject;

const require = createRequire(import.meta.url);

const SQLITE_SCHEMA = `
CREATE TABLE IF NOT EXISTS pages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  title TEXT NOT NULL,
  branch TEXT NOT NULL,
  content TEXT NOT NULL,
  author TEXT NOT NULL,
  edit_summary TEXT NOT NULL,
  edit_permission TEXT NOT NULL,
  allowed_users TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE(title, branch)
);
CREATE INDEX IF NOT EXISTS pages_branch_updated_idx ON pages(branch, updated_at DESC);
CREATE TABLE IF NOT EXISTS history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  title TEXT NOT NULL,
  branch TEXT NOT NULL,
  content TEXT NOT NULL,
  author TEXT NOT NULL,
  edit_summary TEXT NOT NULL,
  edit_permission TEXT NOT NULL,
  allowed_users TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  archived_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS history_version_idx ON history(title, branch, updated_at DESC);
CREATE TABLE IF NOT EXISTS branches (
  page_title TEXT NOT NULL,
  branch_name TEXT NOT NULL,
  created_from TEXT NOT NULL,
  created_at TEXT NOT NULL,
  PRIMARY KEY(page_title, branch_name)
);
CREATE TABLE IF NOT EXISTS edit_sessions (
  session_id TEXT PRIMARY KEY,
  client_id TEXT NOT NULL,
  user_id TEXT NOT NULL,
  username TEXT NOT NULL,
  page TEXT NOT NULL,
  branch TEXT NOT NULL,
  mode TEXT NOT NULL,
  lease_expires_at INTEGER NOT NULL,
  last_heartbeat INTEGER NOT NULL,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS edit_sessions_roster_idx ON edit_sessions(page, branch, lease_expires_at);
CREATE TABLE IF NOT EXISTS user_edits (
  username TEXT PRIMARY KEY,
  total_edits INTEGER NOT NULL
);
CREATE TABLE IF NOT EXISTS user_page_edits (
  username TEXT NOT NULL,
  page_title TEXT NOT NULL,
  edits INTEGER NOT NULL,
  PRIMARY KEY(username, page_title)
);
`;

let sqlRuntimePromise: Promise<SqlJsStatic> | null = null;

const isSqlJsInit = (value: unknown): value is SqlJsInit => typeof value === "function";

const getSqlRuntime = async (): Promise<SqlJsStatic> => {
  if (!sqlRuntimePromise) {
    sqlRuntimePromise = (async () => {
      const imported: unknown = require("sql.js");
      if (!isSqlJsInit(imported)) {
        throw new StorageUnavailableError("sql.js could not be initialized.");
      }

      return imported({
        locateFile: (file: string) => require.resolve(`sql.js/dist/${file}`)
      });
    })();
  }

  return sqlRuntimePromise;
};

export const rowString = (row: SqlRow, key: string, fallback = ""): string => {
  const value = row[key];
  if (value === undefined || value === null) return fallback;
  return typeof value === "string" ? value : String(value);
};

export const rowNumber = (row: SqlRow, key: string): number => {
  const parsed = Number(row[key]);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
};

export const rowStringArray = (row: SqlRow, key: string): string[] => {
  const raw = row[key];
  if (typeof raw !== "string") return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) return [];
    return parsed.map((entry) => String(entry).trim()).filter((entry) => entry.length > 0);
  } catch {
    return [];
  }
};

/** Synchronous statement helpers handed to `read` and `mutate` tasks. */
export class SqlHandle {
  constructor(private readonly db: Database) {}

  run(sql: string, params: SqlValue[] = []): void {
    this.db.run(sql, params);
  }

  /** Rows changed by the most recent INSERT, UPDATE or DELETE. */
  changes(): number {
    return this.db.getRowsModified();
  }

  all(sql: string, params: BindParams = []): SqlRow[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: SqlRow[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  get(sql: string, params: BindParams = []): SqlRow | null {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      return stmt.step() ? stmt.getAsObject() : null;
    } finally {
      stmt.free();
    }
  }

  totalChanges(): number {
    const row = this.get("SELECT total_changes() AS total");
    return row ? rowNumber(row, "total") : 0;
  }
}

export interface OpenWikiDatabaseOptions {
  /** Omit for a purely in-memory database. */
  filePath?: string | null;
  logger: WikiLogger;
}

export class WikiDatabase {
  private db: Database | null;
  private lock: Promise<void> = Promise.resolve();

  private constructor(
    db: Database,
    private readonly filePath: string | null,
    private readonly logger: WikiLogger
  ) {
    this.db = db;
  }

  static async open(options: OpenWikiDatabaseOptions): Promise<WikiDatabase> {
    let SQL: SqlJsStatic;
    try {
      SQL = await getSqlRuntime();
    } catch (error) {
      sqlRuntimePromise = null;
      throw new StorageUnavailableError(`SQLite runtime unavailable: ${errorMessage(error)}`);
    }

    const filePath = options.filePath ?? null;
    const sourceBytes = filePath ? await readBinaryFile(filePath) : null;

    let db: Database;
    try {
      db = sourceBytes ? new SQL.Database(sourceBytes) : new SQL.Database();
      db.exec(SQLITE_SCHEMA);
    } catch (error) {
      if (!filePath) throw error;
      const movedTo = await quarantineFile(filePath);
      options.logger.warn({ filePath, movedTo, err: errorMessage(error) }, "Database file unreadable, starting empty");
      db = new SQL.Database();
      db.exec(SQLITE_SCHEMA);
    }

    return new WikiDatabase(db, filePath, options.logger);
  }

  private withLock = async <T>(task: () => Promise<T>): Promise<T> => {
    const current = this.lock;
    let release!: () => void;
    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await current;
    try {
      return await task();
    } finally {
      release();
    }
  };

  private requireDb(): Database {
    if (!this.db) {
      throw new StorageUnavailableError();
    }
    return this.db;
  }

  async read<T>(task: (sql: SqlHandle) => T): Promise<T> {
    return this.withLock(async () => task(new SqlHandle(this.requireDb())));
  }

  /**
   * Runs the task inside one transaction and writes the database file when
   * anything changed. Throws PersistenceError if only the file write failed.
   */
  async mutate<T>(task: (sql: SqlHandle) => T): Promise<T> {
    return this.withLock(async () => {
      const db = this.requireDb();
      const handle = new SqlHandle(db);
      const before = handle.totalChanges();

      db.run("BEGIN TRANSACTION");
      let result: T;
      try {
        result = task(handle);
        db.run("COMMIT");
      } catch (error) {
        this.rollback(db);
        throw error;
      }

      if (handle.totalChanges() !== before) {
        await this.persist(db);
      }

      return result;
    });
  }

  private rollback(db: Database): void {
    try {
      db.run("ROLLBACK");
    } catch (rollbackError) {
      // SQLite already rolled back on its own for some statement failures.
      this.logger.warn({ err: errorMessage(rollbackError) }, "Rollback skipped");
    }
  }

  private async persist(db: Database): Promise<void> {
    if (!this.filePath) return;
    try {
      await writeBinaryFileAtomic(this.filePath, db.export());
    } catch (error) {
      throw new PersistenceError(`Database file could not be written: ${errorMessage(error)}`, { cause: error });
    }
  }

  close(): void {
    if (!this.db) return;
    const db = this.db;
    this.db = null;
    db.close();
  }
}
