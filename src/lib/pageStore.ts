import type { WikiPage, WikiPageSummary } from "../types.js";
import { type SqlHandle, type SqlRow, rowString, rowStringArray } from "./sqliteStore.js";
import { isEditPermission } from "./validation.js";

export const PAGE_COLUMNS =
  "title, branch, content, author, edit_summary, edit_permission, allowed_users, created_at, updated_at";

const EXCERPT_LENGTH = 220;

const cleanTextExcerpt = (markdown: string): string => {
  return markdown
    .replace(/```[\s\S]*?```/g, " ")
    .replace(/`[^`]*`/g, " ")
    .replace(/[#>*_[\]()-]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
};

export const mapPageRow = (row: SqlRow): WikiPage => {
  const permission = rowString(row, "edit_permission");
  return {
    title: rowString(row, "title"),
    branch: rowString(row, "branch"),
    content: rowString(row, "content"),
    author: rowString(row, "author"),
    editSummary: rowString(row, "edit_summary"),
    editPermission: isEditPermission(permission) ? permission : "everybody",
    allowedUsers: rowStringArray(row, "allowed_users"),
    createdAt: rowString(row, "created_at"),
    updatedAt: rowString(row, "updated_at")
  };
};

export const toPageSummary = (page: WikiPage): WikiPageSummary => ({
  title: page.title,
  branch: page.branch,
  author: page.author,
  excerpt: cleanTextExcerpt(page.content).slice(0, EXCERPT_LENGTH),
  updatedAt: page.updatedAt
});

export const pageValues = (page: WikiPage): string[] => [
  page.title,
  page.branch,
  page.content,
  page.author,
  page.editSummary,
  page.editPermission,
  JSON.stringify(page.allowedUsers),
  page.createdAt,
  page.updatedAt
];

export const findPage = (sql: SqlHandle, title: string, branch: string): WikiPage | null => {
  const row = sql.get(`SELECT ${PAGE_COLUMNS} FROM pages WHERE title = ? AND branch = ?`, [title, branch]);
  return row ? mapPageRow(row) : null;
};

export const titleExists = (sql: SqlHandle, title: string): boolean =>
  sql.get("SELECT 1 AS found FROM pages WHERE title = ? LIMIT 1", [title]) !== null;

export const insertPage = (sql: SqlHandle, page: WikiPage): void => {
  sql.run(`INSERT INTO pages (${PAGE_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`, pageValues(page));
};

export const overwritePage = (sql: SqlHandle, page: WikiPage): void => {
  sql.run(
    `UPDATE pages
        SET content = ?, author = ?, edit_summary = ?, edit_permission = ?, allowed_users = ?, updated_at = ?
      WHERE title = ? AND branch = ?`,
    [
      page.content,
      page.author,
      page.editSummary,
      page.editPermission,
      JSON.stringify(page.allowedUsers),
      page.updatedAt,
      page.title,
      page.branch
    ]
  );
};

export const deletePageRows = (sql: SqlHandle, title: string, branch?: string): number => {
  if (branch === undefined) {
    sql.run("DELETE FROM pages WHERE title = ?", [title]);
  } else {
    sql.run("DELETE FROM pages WHERE title = ? AND branch = ?", [title, branch]);
  }
  return sql.changes();
};

export const renamePageRows = (sql: SqlHandle, oldTitle: string, newTitle: string): void => {
  sql.run("UPDATE pages SET title = ? WHERE title = ?", [newTitle, oldTitle]);
};

export const listPageBranchNames = (sql: SqlHandle, title: string): string[] =>
  sql.all("SELECT branch FROM pages WHERE title = ? ORDER BY branch", [title]).map((row) => rowString(row, "branch"));

export const listPagesOnBranch = (sql: SqlHandle, branch: string, limit?: number): WikiPage[] => {
  const rows =
    limit === undefined
      ? sql.all(`SELECT ${PAGE_COLUMNS} FROM pages WHERE branch = ? ORDER BY updated_at DESC, id DESC`, [branch])
      : sql.all(`SELECT ${PAGE_COLUMNS} FROM pages WHERE branch = ? ORDER BY updated_at DESC, id DESC LIMIT ?`, [
          branch,
          limit
        ]);
  return rows.map(mapPageRow);
};
