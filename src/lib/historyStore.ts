import type { HistoryEntry, WikiPage } from "../types.js";
import { PAGE_COLUMNS, mapPageRow, pageValues } from "./pageStore.js";
import { type SqlHandle, type SqlRow, rowNumber, rowString } from "./sqliteStore.js";

const HISTORY_COLUMNS = `id, ${PAGE_COLUMNS}, archived_at`;
const NEWEST_FIRST = "ORDER BY updated_at DESC, id DESC";

const mapHistoryRow = (row: SqlRow): HistoryEntry => ({
  ...mapPageRow(row),
  id: rowNumber(row, "id"),
  archivedAt: rowString(row, "archived_at")
});

/** Appends a snapshot of `page` as it is now, keeping its own `updatedAt`. */
export const archivePage = (sql: SqlHandle, page: WikiPage, archivedAt: string): void => {
  sql.run(`INSERT INTO history (${PAGE_COLUMNS}, archived_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`, [
    ...pageValues(page),
    archivedAt
  ]);
};

export const countHistory = (sql: SqlHandle, title: string, branch: string): number => {
  const row = sql.get("SELECT COUNT(*) AS total FROM history WHERE title = ? AND branch = ?", [title, branch]);
  return row ? rowNumber(row, "total") : 0;
};

/** `offset` 0 is the most recently archived state. */
export const findHistoryAt = (sql: SqlHandle, title: string, branch: string, offset: number): HistoryEntry | null => {
  const row = sql.get(
    `SELECT ${HISTORY_COLUMNS} FROM history WHERE title = ? AND branch = ? ${NEWEST_FIRST} LIMIT 1 OFFSET ?`,
    [title, branch, offset]
  );
  return row ? mapHistoryRow(row) : null;
};

export const listHistory = (sql: SqlHandle, title: string, branch: string, limit?: number): HistoryEntry[] => {
  const rows =
    limit === undefined
      ? sql.all(`SELECT ${HISTORY_COLUMNS} FROM history WHERE title = ? AND branch = ? ${NEWEST_FIRST}`, [title, branch])
      : sql.all(`SELECT ${HISTORY_COLUMNS} FROM history WHERE title = ? AND branch = ? ${NEWEST_FIRST} LIMIT ?`, [
          title,
          branch,
          limit
        ]);
  return rows.map(mapHistoryRow);
};

/**
 * Copies every history row of `fromBranch` onto `toBranch`, oldest first.
 * Rows already present on the target (same timestamp, author, content and
 * summary) are skipped. Returns the number of rows written.
 */
export const copyHistory = (
  sql: SqlHandle,
  title: string,
  fromBranch: string,
  toBranch: string,
  archivedAt: string
): number => {
  const source = listHistory(sql, title, fromBranch).reverse();
  let copied = 0;

  for (const entry of source) {
    const duplicate = sql.get(
      `SELECT 1 AS found FROM history
        WHERE title = ? AND branch = ? AND updated_at = ? AND author = ? AND content = ? AND edit_summary = ?
        LIMIT 1`,
      [title, toBranch, entry.updatedAt, entry.author, entry.content, entry.editSummary]
    );
    if (duplicate) continue;

    archivePage(sql, { ...entry, branch: toBranch }, archivedAt);
    copied += 1;
  }

  return copied;
};

export const renameHistoryRows = (sql: SqlHandle, oldTitle: string, newTitle: string): void => {
  sql.run("UPDATE history SET title = ? WHERE title = ?", [newTitle, oldTitle]);
};
