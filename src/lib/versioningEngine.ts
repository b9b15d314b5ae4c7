import type {
  BranchRecord,
  EditPermission,
  UserEditStats,
  VersionDetail,
  VersionEntry,
  WikiLogger,
  WikiPage,
  WikiPageSummary
} from "../types.js";
import {
  deleteBranchRecord,
  deleteBranchRecordsForTitle,
  isBranchRegistered,
  listBranchRecords,
  listRegisteredBranchNames,
  registerBranch,
  renameBranchRecords
} from "./branchStore.js";
import { getEditStats, recordEdit, renamePageEdits } from "./editStatsStore.js";
import { PersistenceError, StorageUnavailableError, type WikiResult, fail } from "./errors.js";
import { archivePage, copyHistory, countHistory, findHistoryAt, listHistory, renameHistoryRows } from "./historyStore.js";
import {
  deletePageRows,
  findPage,
  insertPage,
  listPageBranchNames,
  listPagesOnBranch,
  overwritePage,
  renamePageRows,
  titleExists,
  toPageSummary
} from "./pageStore.js";
import type { SqlHandle, WikiDatabase } from "./sqliteStore.js";
import { type UnifiedDiff, buildUnifiedDiff } from "./textDiff.js";
import {
  DEFAULT_AUTHOR,
  MAIN_BRANCH,
  TALK_BRANCH,
  normalizeAllowedUsers,
  normalizeAuthor,
  normalizeBranch,
  normalizeSummary,
  validateNewBranchName,
  validateTitle
} from "./validation.js";

const CREATED_PAGE_SUMMARY = "Created page";
const CREATED_TALK_SUMMARY = "Created talk page";
const SEARCH_LIMIT = 100;
const DEFAULT_VERSION_LIMIT = 50;
const DIFF_CONTEXT_LINES = 3;

export interface CreatePageInput {
  title: string;
  content: string;
  author?: string;
  branch?: string;
  summary?: string;
}

export interface UpdatePageInput extends CreatePageInput {
  editPermission?: EditPermission;
  allowedUsers?: string[];
  /** When set, the update fails with `conflict` unless the live page still carries this timestamp. */
  expectedUpdatedAt?: string;
}

export interface CompareSide {
  index: number;
  displayNumber: number;
  author: string;
  updatedAt: string;
}

export interface VersionComparison {
  from: CompareSide;
  to: CompareSide;
  diff: UnifiedDiff;
}

export interface VersioningEngineOptions {
  db: WikiDatabase;
  logger: WikiLogger;
  now?: () => Date;
}

export const formatSignatureTime = (date: Date): string => {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
};

export const signTalkContent = (content: string, author: string, at: Date): string =>
  `${content}\n\n(User:${author} ${formatSignatureTime(at)})`;

const appendTalkBlock = (previous: string, block: string): string => (previous ? `${previous}\n\n${block}` : block);

export class VersioningEngine {
  private readonly db: WikiDatabase;
  private readonly logger: WikiLogger;
  private readonly now: () => Date;

  constructor(options: VersioningEngineOptions) {
    this.db = options.db;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /** Strictly later than `previous`, so two writes in the same millisecond still order. */
  private nextTimestamp(previous?: string): string {
    const nowMs = this.now().getTime();
    const previousMs = previous ? Date.parse(previous) : Number.NaN;
    const stamp = Number.isFinite(previousMs) && previousMs >= nowMs ? previousMs + 1 : nowMs;
    return new Date(stamp).toISOString();
  }

  private async commit<T extends object>(
    operation: string,
    context: Record<string, unknown>,
    task: (sql: SqlHandle) => WikiResult<T>
  ): Promise<WikiResult<T>> {
    try {
      const result = await this.db.mutate(task);
      if (result.ok) {
        this.logger.info(context, `${operation} succeeded`);
      }
      return result;
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.logger.error({ ...context, err: error.message }, `${operation} committed in memory but was not persisted`);
        return fail("partial_failure", "The change was applied but could not be saved to disk.");
      }
      throw error;
    }
  }

  private async readOr<T>(fallback: T, context: Record<string, unknown>, task: (sql: SqlHandle) => T): Promise<T> {
    try {
      return await this.db.read(task);
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        this.logger.warn({ ...context, err: error.message }, "Storage unavailable, returning fallback");
        return fallback;
      }
      throw error;
    }
  }

  private buildPage(input: {
    title: string;
    branch: string;
    content: string;
    author: string;
    summary: string;
    editPermission?: EditPermission | undefined;
    allowedUsers?: string[] | undefined;
    at: string;
  }): WikiPage {
    const editPermission = input.editPermission ?? "everybody";
    return {
      title: input.title,
      branch: input.branch,
      content: input.content,
      author: input.author,
      editSummary: input.summary,
      editPermission,
      allowedUsers: editPermission === "select_users" ? normalizeAllowedUsers(input.allowedUsers ?? []) : [],
      createdAt: input.at,
      updatedAt: input.at
    };
  }

  private insertFresh(sql: SqlHandle, page: WikiPage): void {
    insertPage(sql, page);
    if (page.branch !== MAIN_BRANCH && !isBranchRegistered(sql, page.title, page.branch)) {
      registerBranch(sql, { pageTitle: page.title, branchName: page.branch, createdFrom: "", createdAt: page.createdAt });
    }
  }

  async get(title: string, branch?: string): Promise<WikiPage | null> {
    const checkedTitle = validateTitle(title);
    const checkedBranch = normalizeBranch(branch);
    if (!checkedTitle.ok || !checkedBranch.ok) return null;

    const pageTitle = checkedTitle.value;
    const branchName = checkedBranch.value;
    return this.readOr<WikiPage | null>(null, { title, branch }, (sql) => findPage(sql, pageTitle, branchName));
  }

  async create(input: CreatePageInput): Promise<WikiResult<{ page: WikiPage }>> {
    const checkedTitle = validateTitle(input.title);
    if (!checkedTitle.ok) return fail("invalid", checkedTitle.error);
    const checkedBranch = normalizeBranch(input.branch);
    if (!checkedBranch.ok) return fail("invalid", checkedBranch.error);

    const title = checkedTitle.value;
    const branch = checkedBranch.value;
    const author = normalizeAuthor(input.author);
    const summary = normalizeSummary(input.summary);

    return this.commit<{ page: WikiPage }>("create", { title, branch, author }, (sql) => {
      if (findPage(sql, title, branch)) {
        return fail("conflict", `Page "${title}" already exists on branch "${branch}".`);
      }

      const at = this.now();
      const content = branch === TALK_BRANCH ? signTalkContent(input.content, author, at) : input.content;
      const page = this.buildPage({ title, branch, content, author, summary, at: at.toISOString() });
      this.insertFresh(sql, page);
      if (author !== DEFAULT_AUTHOR) {
        recordEdit(sql, author, title);
      }
      return { ok: true, page };
    });
  }

  async update(input: UpdatePageInput): Promise<WikiResult<{ page: WikiPage; created: boolean }>> {
    const checkedTitle = validateTitle(input.title);
    if (!checkedTitle.ok) return fail("invalid", checkedTitle.error);
    const checkedBranch = normalizeBranch(input.branch);
    if (!checkedBranch.ok) return fail("invalid", checkedBranch.error);

    const title = checkedTitle.value;
    const branch = checkedBranch.value;
    const author = normalizeAuthor(input.author);
    const summary = normalizeSummary(input.summary);

    return this.commit<{ page: WikiPage; created: boolean }>("update", { title, branch, author }, (sql) => {
      const existing = findPage(sql, title, branch);
      if (input.expectedUpdatedAt !== undefined && existing?.updatedAt !== input.expectedUpdatedAt) {
        return fail("conflict", "The page was changed since it was loaded.");
      }

      const at = this.now();
      let page: WikiPage;
      let created = false;

      if (!existing) {
        created = true;
        const stamp = at.toISOString();
        const permissions = { editPermission: input.editPermission, allowedUsers: input.allowedUsers };

        if (!titleExists(sql, title)) {
          // First save of a title: main gets the content and talk starts empty, whichever branch was asked for.
          const mainPage = this.buildPage({
            title,
            branch: MAIN_BRANCH,
            content: input.content,
            author,
            summary: summary || CREATED_PAGE_SUMMARY,
            ...permissions,
            at: stamp
          });
          const talkPage = this.buildPage({
            title,
            branch: TALK_BRANCH,
            content: "",
            author,
            summary: CREATED_TALK_SUMMARY,
            at: stamp
          });
          this.insertFresh(sql, mainPage);
          this.insertFresh(sql, talkPage);
          page = branch === TALK_BRANCH ? talkPage : mainPage;

          if (branch !== MAIN_BRANCH && branch !== TALK_BRANCH) {
            page = this.buildPage({ title, branch, content: input.content, author, summary, ...permissions, at: stamp });
            this.insertFresh(sql, page);
          }
        } else {
          const signed = branch === TALK_BRANCH ? signTalkContent(input.content, author, at) : input.content;
          page = this.buildPage({ title, branch, content: signed, author, summary, ...permissions, at: stamp });
          this.insertFresh(sql, page);
        }
      } else {
        archivePage(sql, existing, at.toISOString());

        const editPermission = input.editPermission ?? existing.editPermission;
        page = {
          ...existing,
          content:
            branch === TALK_BRANCH
              ? appendTalkBlock(existing.content, signTalkContent(input.content, author, at))
              : input.content,
          author,
          editSummary: summary,
          editPermission,
          allowedUsers:
            editPermission === "select_users" ? normalizeAllowedUsers(input.allowedUsers ?? existing.allowedUsers) : [],
          updatedAt: this.nextTimestamp(existing.updatedAt)
        };
        overwritePage(sql, page);
      }

      if (author !== DEFAULT_AUTHOR) {
        recordEdit(sql, author, title);
      }

      return { ok: true, page, created };
    });
  }

  async fork(
    title: string,
    newBranch: string,
    sourceBranch?: string
  ): Promise<WikiResult<{ page: WikiPage; branch: BranchRecord; copiedHistory: number }>> {
    const checkedTitle = validateTitle(title);
    if (!checkedTitle.ok) return fail("invalid", checkedTitle.error);
    const checkedNew = validateNewBranchName(newBranch);
    if (!checkedNew.ok) return fail("invalid", checkedNew.error);
    const checkedSource = normalizeBranch(sourceBranch);
    if (!checkedSource.ok) return fail("invalid", checkedSource.error);

    const pageTitle = checkedTitle.value;
    const branchName = checkedNew.value;
    const createdFrom = checkedSource.value;

    return this.commit<{ page: WikiPage; branch: BranchRecord; copiedHistory: number }>("fork", { title: pageTitle, branch: branchName, source: createdFrom }, (sql) => {
      if (isBranchRegistered(sql, pageTitle, branchName) || findPage(sql, pageTitle, branchName)) {
        return fail("conflict", `Branch "${branchName}" already exists for "${pageTitle}".`);
      }

      const source = findPage(sql, pageTitle, createdFrom);
      if (!source) {
        return fail("not_found", `Page "${pageTitle}" does not exist on branch "${createdFrom}".`);
      }

      const at = this.now().toISOString();
      const record: BranchRecord = { pageTitle, branchName, createdFrom, createdAt: at };
      registerBranch(sql, record);
      const copiedHistory = copyHistory(sql, pageTitle, createdFrom, branchName, at);

      // The live fork must sort above every archived row on the new branch.
      const newestArchived = findHistoryAt(sql, pageTitle, branchName, 0);
      const previous =
        newestArchived && Date.parse(newestArchived.updatedAt) > Date.parse(source.updatedAt)
          ? newestArchived.updatedAt
          : source.updatedAt;
      const page: WikiPage = { ...source, branch: branchName, createdAt: at, updatedAt: this.nextTimestamp(previous) };
      insertPage(sql, page);

      return { ok: true, page, branch: record, copiedHistory };
    });
  }

  async restoreVersion(title: string, branch: string | undefined, index: number): Promise<WikiResult<{ page: WikiPage }>> {
    const checkedTitle = validateTitle(title);
    if (!checkedTitle.ok) return fail("invalid", checkedTitle.error);
    const checkedBranch = normalizeBranch(branch);
    if (!checkedBranch.ok) return fail("invalid", checkedBranch.error);
    if (!Number.isInteger(index) || index < 0) return fail("invalid", "Version index must be a non-negative integer.");
    if (index === 0) return fail("noop", "The current version cannot be restored onto itself.");

    const pageTitle = checkedTitle.value;
    const branchName = checkedBranch.value;

    return this.commit<{ page: WikiPage }>("restoreVersion", { title: pageTitle, branch: branchName, index }, (sql) => {
      const current = findPage(sql, pageTitle, branchName);
      if (!current) {
        return fail("not_found", `Page "${pageTitle}" does not exist on branch "${branchName}".`);
      }

      const entry = findHistoryAt(sql, pageTitle, branchName, index - 1);
      if (!entry) {
        return fail("not_found", `Version ${index} does not exist.`);
      }

      archivePage(sql, current, this.now().toISOString());
      const page: WikiPage = {
        ...current,
        content: entry.content,
        author: entry.author,
        editSummary: entry.editSummary || `Restored version ${index}`,
        updatedAt: this.nextTimestamp(current.updatedAt)
      };
      overwritePage(sql, page);

      return { ok: true, page };
    });
  }

  async compareVersions(
    title: string,
    branch: string | undefined,
    fromIndex: number,
    toIndex: number
  ): Promise<WikiResult<VersionComparison>> {
    const checkedTitle = validateTitle(title);
    if (!checkedTitle.ok) return fail("invalid", checkedTitle.error);
    const checkedBranch = normalizeBranch(branch);
    if (!checkedBranch.ok) return fail("invalid", checkedBranch.error);
    if (![fromIndex, toIndex].every((index) => Number.isInteger(index) && index >= 0)) {
      return fail("invalid", "Version indices must be non-negative integers.");
    }
    if (fromIndex === toIndex) return fail("invalid", "Pick two different versions to compare.");

    const pageTitle = checkedTitle.value;
    const branchName = checkedBranch.value;

    return this.db.read((sql): WikiResult<VersionComparison> => {
      const current = findPage(sql, pageTitle, branchName);
      if (!current) {
        return fail("not_found", `Page "${pageTitle}" does not exist on branch "${branchName}".`);
      }

      const total = 1 + countHistory(sql, pageTitle, branchName);
      if (total < 2) return fail("invalid", "At least two versions are needed for a comparison.");

      const resolve = (index: number): WikiPage | null =>
        index === 0 ? current : findHistoryAt(sql, pageTitle, branchName, index - 1);
      const fromPage = resolve(fromIndex);
      const toPage = resolve(toIndex);
      if (!fromPage || !toPage) return fail("not_found", "Version not found.");

      const side = (index: number, page: WikiPage): CompareSide => ({
        index,
        displayNumber: total - index,
        author: page.author,
        updatedAt: page.updatedAt
      });

      return {
        ok: true,
        from: side(fromIndex, fromPage),
        to: side(toIndex, toPage),
        diff: buildUnifiedDiff(fromPage.content, toPage.content, { contextLines: DIFF_CONTEXT_LINES })
      };
    });
  }

  async rename(oldTitle: string, newTitle: string): Promise<WikiResult<{ title: string; renamed: boolean }>> {
    const checkedOld = validateTitle(oldTitle);
    if (!checkedOld.ok) return fail("invalid", checkedOld.error);
    const checkedNew = validateTitle(newTitle);
    if (!checkedNew.ok) return fail("invalid", checkedNew.error);

    const from = checkedOld.value;
    const to = checkedNew.value;
    if (from === to) return { ok: true, title: to, renamed: false };

    return this.commit<{ title: string; renamed: boolean }>("rename", { from, to }, (sql) => {
      if (!titleExists(sql, from)) return fail("not_found", `Page "${from}" does not exist.`);
      if (titleExists(sql, to)) return fail("conflict", `Page "${to}" already exists.`);

      renamePageRows(sql, from, to);
      renameHistoryRows(sql, from, to);
      renameBranchRecords(sql, from, to);
      renamePageEdits(sql, from, to);

      return { ok: true, title: to, renamed: true };
    });
  }

  async deletePage(title: string): Promise<WikiResult<{ deletedBranches: number }>> {
    const checkedTitle = validateTitle(title);
    if (!checkedTitle.ok) return fail("invalid", checkedTitle.error);
    const pageTitle = checkedTitle.value;

    return this.commit<{ deletedBranches: number }>("deletePage", { title: pageTitle }, (sql) => {
      const deletedBranches = deletePageRows(sql, pageTitle);
      if (deletedBranches === 0) return fail("not_found", `Page "${pageTitle}" does not exist.`);
      deleteBranchRecordsForTitle(sql, pageTitle);
      return { ok: true, deletedBranches };
    });
  }

  async deleteBranch(title: string, branch: string): Promise<WikiResult> {
    const checkedTitle = validateTitle(title);
    if (!checkedTitle.ok) return fail("invalid", checkedTitle.error);
    const checkedBranch = normalizeBranch(branch);
    if (!checkedBranch.ok) return fail("invalid", checkedBranch.error);

    const pageTitle = checkedTitle.value;
    const branchName = checkedBranch.value;

    return this.commit<Record<never, never>>("deleteBranch", { title: pageTitle, branch: branchName }, (sql) => {
      const removedPages = deletePageRows(sql, pageTitle, branchName);
      if (removedPages === 0) {
        return fail("not_found", `Branch "${branchName}" does not exist for "${pageTitle}".`);
      }
      deleteBranchRecord(sql, pageTitle, branchName);
      return { ok: true };
    });
  }

  /** Branches of one title, `main` first. */
  async listBranches(title: string): Promise<string[]> {
    const checkedTitle = validateTitle(title);
    if (!checkedTitle.ok) return [MAIN_BRANCH];

    const pageTitle = checkedTitle.value;
    return this.readOr([MAIN_BRANCH], { title }, (sql) => {
      const names = new Set<string>([
        ...listBranchRecords(sql, pageTitle).map((record) => record.branchName),
        ...listPageBranchNames(sql, pageTitle)
      ]);
      names.delete(MAIN_BRANCH);
      return [MAIN_BRANCH, ...[...names].sort((a, b) => a.localeCompare(b))];
    });
  }

  async listBranchRecords(title: string): Promise<BranchRecord[]> {
    const checkedTitle = validateTitle(title);
    if (!checkedTitle.ok) return [];
    const pageTitle = checkedTitle.value;
    return this.readOr<BranchRecord[]>([], { title }, (sql) => listBranchRecords(sql, pageTitle));
  }

  async listAllBranches(): Promise<string[]> {
    return this.readOr([MAIN_BRANCH], {}, (sql) => {
      const names = new Set(listRegisteredBranchNames(sql));
      names.delete(MAIN_BRANCH);
      return [MAIN_BRANCH, ...[...names].sort((a, b) => a.localeCompare(b))];
    });
  }

  async searchPages(query: string, branch?: string): Promise<WikiPageSummary[]> {
    const normalizedQuery = query.trim().toLowerCase();
    const checkedBranch = normalizeBranch(branch);
    if (!normalizedQuery || !checkedBranch.ok) return [];

    const branchName = checkedBranch.value;
    const pages = await this.readOr<WikiPage[]>([], { query: normalizedQuery, branch }, (sql) =>
      listPagesOnBranch(sql, branchName)
    );

    return pages
      .map((page) => {
        const titleLower = page.title.toLowerCase();
        let score = 0;
        if (titleLower.startsWith(normalizedQuery)) {
          score += 12;
        } else if (titleLower.includes(normalizedQuery)) {
          score += 8;
        }

        if (page.content.toLowerCase().includes(normalizedQuery)) {
          score += 2;
        }

        return { score, page };
      })
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score || Date.parse(b.page.updatedAt) - Date.parse(a.page.updatedAt))
      .slice(0, SEARCH_LIMIT)
      .map((entry) => toPageSummary(entry.page));
  }

  async listPagesByBranch(branch?: string, limit?: number): Promise<WikiPageSummary[]> {
    const checkedBranch = normalizeBranch(branch);
    if (!checkedBranch.ok) return [];
    const branchName = checkedBranch.value;
    const pages = await this.readOr<WikiPage[]>([], { branch }, (sql) => listPagesOnBranch(sql, branchName, limit));
    return pages.map(toPageSummary);
  }

  /** Newest first; index 0 is the live page. */
  async listVersions(title: string, branch?: string, limit = DEFAULT_VERSION_LIMIT): Promise<VersionEntry[]> {
    const checkedTitle = validateTitle(title);
    const checkedBranch = normalizeBranch(branch);
    if (!checkedTitle.ok || !checkedBranch.ok || limit < 1) return [];

    const pageTitle = checkedTitle.value;
    const branchName = checkedBranch.value;
    return this.readOr<VersionEntry[]>([], { title, branch }, (sql) => {
      const current = findPage(sql, pageTitle, branchName);
      if (!current) return [];

      const total = 1 + countHistory(sql, pageTitle, branchName);
      const archived = limit > 1 ? listHistory(sql, pageTitle, branchName, limit - 1) : [];

      return [current, ...archived].map((page, index) => ({
        index,
        displayNumber: total - index,
        author: page.author,
        updatedAt: page.updatedAt,
        editSummary: page.editSummary,
        isCurrent: index === 0
      }));
    });
  }

  async getVersion(title: string, branch: string | undefined, index: number): Promise<VersionDetail | null> {
    const checkedTitle = validateTitle(title);
    const checkedBranch = normalizeBranch(branch);
    if (!checkedTitle.ok || !checkedBranch.ok || !Number.isInteger(index) || index < 0) return null;

    const pageTitle = checkedTitle.value;
    const branchName = checkedBranch.value;
    return this.readOr<VersionDetail | null>(null, { title, branch, index }, (sql) => {
      const current = findPage(sql, pageTitle, branchName);
      if (!current) return null;

      const page = index === 0 ? current : findHistoryAt(sql, pageTitle, branchName, index - 1);
      if (!page) return null;

      const total = 1 + countHistory(sql, pageTitle, branchName);
      return {
        index,
        displayNumber: total - index,
        author: page.author,
        updatedAt: page.updatedAt,
        editSummary: page.editSummary,
        isCurrent: index === 0,
        content: page.content
      };
    });
  }

  async getUserEditStats(username: string): Promise<UserEditStats> {
    const name = username.trim();
    return this.readOr<UserEditStats>({ username: name, totalEdits: 0, pageEdits: {} }, { username: name }, (sql) =>
      getEditStats(sql, name)
    );
  }
}
