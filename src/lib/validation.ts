import type { EditPermission, PresenceMode } from "../types.js";

export const MAIN_BRANCH = "main";
export const TALK_BRANCH = "talk";
export const DEFAULT_AUTHOR = "Anonymous";

const TITLE_MAX_LENGTH = 200;
const BRANCH_MAX_LENGTH = 80;
const SUMMARY_MAX_LENGTH = 250;
const FORBIDDEN_TITLE_CHARS = /[:/\\?#]/;
const RESERVED_BRANCH_NAMES: ReadonlySet<string> = new Set(["main", "master", "head", "origin", TALK_BRANCH]);
const EDIT_PERMISSIONS: ReadonlySet<string> = new Set(["everybody", "ten_edits", "fifty_edits", "select_users"]);

export type Checked<T> = { ok: true; value: T } | { ok: false; error: string };

export const validateTitle = (raw: string): Checked<string> => {
  const title = raw.trim();
  if (!title) return { ok: false, error: "Title must not be empty." };
  if (title.length > TITLE_MAX_LENGTH) return { ok: false, error: `Title is longer than ${TITLE_MAX_LENGTH} characters.` };
  if (title.includes("..") || title.startsWith("/")) return { ok: false, error: "Title contains a path sequence." };
  if (FORBIDDEN_TITLE_CHARS.test(title)) return { ok: false, error: "Title must not contain : / \\ ? or #." };
  return { ok: true, value: title };
};

/** Empty input means the default branch. */
export const normalizeBranch = (raw: string | undefined | null): Checked<string> => {
  const branch = (raw ?? "").trim();
  if (!branch) return { ok: true, value: MAIN_BRANCH };
  if (branch.length > BRANCH_MAX_LENGTH) {
    return { ok: false, error: `Branch name is longer than ${BRANCH_MAX_LENGTH} characters.` };
  }
  if (branch.includes("..") || branch.includes("/") || branch.includes("\\")) {
    return { ok: false, error: "Branch name contains a path sequence." };
  }
  return { ok: true, value: branch };
};

export const validateNewBranchName = (raw: string): Checked<string> => {
  if (!raw.trim()) return { ok: false, error: "Branch name must not be empty." };
  const checked = normalizeBranch(raw);
  if (!checked.ok) return checked;
  if (RESERVED_BRANCH_NAMES.has(checked.value.toLowerCase())) {
    return { ok: false, error: `"${checked.value}" is a reserved branch name.` };
  }
  return checked;
};

export const normalizeSummary = (raw: string | undefined | null): string => (raw ?? "").trim().slice(0, SUMMARY_MAX_LENGTH);

export const normalizeAuthor = (raw: string | undefined | null): string => (raw ?? "").trim() || DEFAULT_AUTHOR;

export const isEditPermission = (value: unknown): value is EditPermission =>
  typeof value === "string" && EDIT_PERMISSIONS.has(value);

export const normalizeAllowedUsers = (values: readonly string[]): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const entry = value.trim();
    if (!entry || seen.has(entry.toLowerCase())) continue;
    seen.add(entry.toLowerCase());
    result.push(entry);
  }
  return result;
};

export const normalizePresenceMode = (raw: string | undefined | null): PresenceMode | null => {
  const mode = (raw ?? "").trim().toLowerCase();
  if (!mode) return "edit";
  return mode === "edit" || mode === "view" ? mode : null;
};

export const parseVersionIndex = (raw: unknown): number | null => {
  if (typeof raw === "number") {
    return Number.isInteger(raw) && raw >= 0 ? raw : null;
  }
  if (typeof raw !== "string" || !/^\d+$/.test(raw.trim())) return null;
  const parsed = Number.parseInt(raw.trim(), 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
};
