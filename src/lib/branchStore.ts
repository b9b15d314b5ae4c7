import type { BranchRecord } from "../types.js";
import { type SqlHandle, type SqlRow, rowString } from "./sqliteStore.js";

const mapBranchRow = (row: SqlRow): BranchRecord => ({
  pageTitle: rowString(row, "page_title"),
  branchName: rowString(row, "branch_name"),
  createdFrom: rowString(row, "created_from"),
  createdAt: rowString(row, "created_at")
});

export const isBranchRegistered = (sql: SqlHandle, title: string, branch: string): boolean =>
  sql.get("SELECT 1 AS found FROM branches WHERE page_title = ? AND branch_name = ?", [title, branch]) !== null;

export const registerBranch = (sql: SqlHandle, record: BranchRecord): void => {
  sql.run("INSERT INTO branches (page_title, branch_name, created_from, created_at) VALUES (?, ?, ?, ?)", [
    record.pageTitle,
    record.branchName,
    record.createdFrom,
    record.createdAt
  ]);
};

export const deleteBranchRecord = (sql: SqlHandle, title: string, branch: string): number => {
  sql.run("DELETE FROM branches WHERE page_title = ? AND branch_name = ?", [title, branch]);
  return sql.changes();
};

export const deleteBranchRecordsForTitle = (sql: SqlHandle, title: string): void => {
  sql.run("DELETE FROM branches WHERE page_title = ?", [title]);
};

export const renameBranchRecords = (sql: SqlHandle, oldTitle: string, newTitle: string): void => {
  sql.run("UPDATE branches SET page_title = ? WHERE page_title = ?", [newTitle, oldTitle]);
};

export const listBranchRecords = (sql: SqlHandle, title: string): BranchRecord[] =>
  sql
    .all(
      "SELECT page_title, branch_name, created_from, created_at FROM branches WHERE page_title = ? ORDER BY created_at, branch_name",
      [title]
    )
    .map(mapBranchRow);

export const listRegisteredBranchNames = (sql: SqlHandle): string[] =>
  sql.all("SELECT DISTINCT branch_name FROM branches ORDER BY branch_name").map((row) => rowString(row, "branch_name"));
