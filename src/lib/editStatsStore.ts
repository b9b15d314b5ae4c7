import type { UserEditStats } from "../types.js";
import { type SqlHandle, rowNumber, rowString } from "./sqliteStore.js";

export const recordEdit = (sql: SqlHandle, username: string, title: string): void => {
  sql.run(
    `INSERT INTO user_edits (username, total_edits) VALUES (?, 1)
     ON CONFLICT(username) DO UPDATE SET total_edits = total_edits + 1`,
    [username]
  );
  sql.run(
    `INSERT INTO user_page_edits (username, page_title, edits) VALUES (?, ?, 1)
     ON CONFLICT(username, page_title) DO UPDATE SET edits = edits + 1`,
    [username, title]
  );
};

export const getTotalEdits = (sql: SqlHandle, username: string): number => {
  const row = sql.get("SELECT total_edits FROM user_edits WHERE username = ?", [username]);
  return row ? rowNumber(row, "total_edits") : 0;
};

export const getEditStats = (sql: SqlHandle, username: string): UserEditStats => {
  const pageEdits: Record<string, number> = {};
  for (const row of sql.all("SELECT page_title, edits FROM user_page_edits WHERE username = ? ORDER BY page_title", [
    username
  ])) {
    pageEdits[rowString(row, "page_title")] = rowNumber(row, "edits");
  }

  return {
    username,
    totalEdits: getTotalEdits(sql, username),
    pageEdits
  };
};

/** Moves per-page counters to the new title. An existing counter there is replaced, not summed. */
export const renamePageEdits = (sql: SqlHandle, oldTitle: string, newTitle: string): void => {
  sql.run(
    `INSERT OR REPLACE INTO user_page_edits (username, page_title, edits)
     SELECT username, ?, edits FROM user_page_edits WHERE page_title = ?`,
    [newTitle, oldTitle]
  );
  sql.run("DELETE FROM user_page_edits WHERE page_title = ?", [oldTitle]);
};
