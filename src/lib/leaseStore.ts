import type { EditPresenceLease, PresenceEditor } from "../types.js";
import { type SqlHandle, type SqlRow, rowNumber, rowString } from "./sqliteStore.js";

const LEASE_COLUMNS =
  "session_id, client_id, user_id, username, page, branch, mode, lease_expires_at, last_heartbeat, created_at";

const mapLeaseRow = (row: SqlRow): EditPresenceLease => ({
  sessionId: rowString(row, "session_id"),
  clientId: rowString(row, "client_id"),
  userId: rowString(row, "user_id"),
  username: rowString(row, "username"),
  page: rowString(row, "page"),
  branch: rowString(row, "branch"),
  mode: rowString(row, "mode") === "view" ? "view" : "edit",
  leaseExpiresAt: rowNumber(row, "lease_expires_at"),
  lastHeartbeat: rowNumber(row, "last_heartbeat"),
  createdAt: rowNumber(row, "created_at")
});

export interface LeaseFilter {
  sessionId: string;
  userId: string;
  page?: string;
  branch?: string;
  mode?: string;
}

export const pruneExpiredLeases = (sql: SqlHandle, page: string, branch: string, now: number): number => {
  sql.run("DELETE FROM edit_sessions WHERE page = ? AND branch = ? AND lease_expires_at <= ?", [page, branch, now]);
  return sql.changes();
};

export const purgeAllExpiredLeases = (sql: SqlHandle, now: number): number => {
  sql.run("DELETE FROM edit_sessions WHERE lease_expires_at <= ?", [now]);
  return sql.changes();
};

export const hasActiveLease = (
  sql: SqlHandle,
  key: { userId: string; clientId: string; page: string; branch: string },
  now: number
): boolean =>
  sql.get(
    `SELECT 1 AS found FROM edit_sessions
      WHERE user_id = ? AND client_id = ? AND page = ? AND branch = ? AND lease_expires_at > ?
      LIMIT 1`,
    [key.userId, key.clientId, key.page, key.branch, now]
  ) !== null;

export const insertLease = (sql: SqlHandle, lease: EditPresenceLease): void => {
  sql.run(`INSERT INTO edit_sessions (${LEASE_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`, [
    lease.sessionId,
    lease.clientId,
    lease.userId,
    lease.username,
    lease.page,
    lease.branch,
    lease.mode,
    lease.leaseExpiresAt,
    lease.lastHeartbeat,
    lease.createdAt
  ]);
};

export const findLease = (sql: SqlHandle, filter: LeaseFilter): EditPresenceLease | null => {
  const clauses = ["session_id = ?", "user_id = ?"];
  const params: string[] = [filter.sessionId, filter.userId];
  if (filter.page !== undefined) {
    clauses.push("page = ?");
    params.push(filter.page);
  }
  if (filter.branch !== undefined) {
    clauses.push("branch = ?");
    params.push(filter.branch);
  }
  if (filter.mode !== undefined) {
    clauses.push("mode = ?");
    params.push(filter.mode);
  }

  const row = sql.get(`SELECT ${LEASE_COLUMNS} FROM edit_sessions WHERE ${clauses.join(" AND ")} LIMIT 1`, params);
  return row ? mapLeaseRow(row) : null;
};

export const extendLease = (sql: SqlHandle, sessionId: string, leaseExpiresAt: number, heartbeatAt: number): void => {
  sql.run("UPDATE edit_sessions SET lease_expires_at = ?, last_heartbeat = ? WHERE session_id = ?", [
    leaseExpiresAt,
    heartbeatAt,
    sessionId
  ]);
};

export const deleteLease = (sql: SqlHandle, sessionId: string, userId?: string): number => {
  if (userId === undefined) {
    sql.run("DELETE FROM edit_sessions WHERE session_id = ?", [sessionId]);
  } else {
    sql.run("DELETE FROM edit_sessions WHERE session_id = ? AND user_id = ?", [sessionId, userId]);
  }
  return sql.changes();
};

export const listRosterEditors = (sql: SqlHandle, page: string, branch: string, now: number): PresenceEditor[] =>
  sql
    .all(
      `SELECT username, client_id FROM edit_sessions
        WHERE page = ? AND branch = ? AND mode = 'edit' AND lease_expires_at > ?
        ORDER BY created_at, session_id`,
      [page, branch, now]
    )
    .map((row) => ({ username: rowString(row, "username"), clientId: rowString(row, "client_id") }));
