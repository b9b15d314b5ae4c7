import { randomUUID } from "node:crypto";
import type { EditPresenceLease, PresenceMode, PresenceRoster, WikiLogger } from "../types.js";
import { PersistenceError, StorageUnavailableError } from "./errors.js";
import {
  deleteLease,
  extendLease,
  findLease,
  hasActiveLease,
  insertLease,
  listRosterEditors,
  pruneExpiredLeases,
  purgeAllExpiredLeases
} from "./leaseStore.js";
import type { SqlHandle, WikiDatabase } from "./sqliteStore.js";
import { normalizeBranch, normalizePresenceMode, validateTitle } from "./validation.js";

export const DEFAULT_LEASE_SECONDS = 90;
export const MAX_EXTENSION_AHEAD_SECONDS = 120;
export const HEARTBEAT_THROTTLE_SECONDS = 5;

const CLIENT_ID_MAX_LENGTH = 128;

export type CreateSessionResult =
  | { ok: true; sessionId: string; leaseExpiresAt: number; roster: PresenceRoster }
  | { ok: false; code: "duplicate" | "unavailable" | "invalid"; error: string };

export type HeartbeatStatus = "extended" | "throttled" | "missing" | "expired" | "offline";

export interface HeartbeatResult {
  status: HeartbeatStatus;
  leaseExpiresAt?: number;
}

export interface CreateSessionInput {
  page: string;
  branch?: string;
  mode?: string;
  clientId: string;
  userId: string;
  username: string;
}

export interface LeaseAddress {
  sessionId: string;
  userId: string;
  page: string;
  branch?: string;
}

export interface EditPresenceServiceOptions {
  db: WikiDatabase;
  logger: WikiLogger;
  now?: () => number;
  generateSessionId?: () => string;
}

type Scope = { page: string; branch: string };

const resolveScope = (page: string, branch: string | undefined): Scope | null => {
  const checkedPage = validateTitle(page);
  const checkedBranch = normalizeBranch(branch);
  if (!checkedPage.ok || !checkedBranch.ok) return null;
  return { page: checkedPage.value, branch: checkedBranch.value };
};

/** Lease lifecycle for "user X is editing page P on branch B". */
export class EditPresenceService {
  private readonly db: WikiDatabase;
  private readonly logger: WikiLogger;
  private readonly now: () => number;
  private readonly generateSessionId: () => string;
  private readonly heartbeatGuard = new Map<string, number>();

  constructor(options: EditPresenceServiceOptions) {
    this.db = options.db;
    this.logger = options.logger;
    this.now = options.now ?? (() => Date.now());
    this.generateSessionId = options.generateSessionId ?? (() => randomUUID());
  }

  /**
   * Runs a lease mutation. Presence is advisory, so an unwritable database
   * file only gets logged; the in-memory result still stands.
   */
  private async mutateOr<T>(fallback: T, context: Record<string, unknown>, task: (sql: SqlHandle) => T): Promise<T> {
    let outcome = fallback;
    try {
      await this.db.mutate((sql) => {
        outcome = task(sql);
      });
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        this.logger.warn({ ...context, err: error.message }, "Presence storage unavailable");
        return fallback;
      }
      if (error instanceof PersistenceError) {
        this.logger.error({ ...context, err: error.message }, "Presence lease change was not persisted");
        return outcome;
      }
      throw error;
    }
    return outcome;
  }

  async createSession(input: CreateSessionInput): Promise<CreateSessionResult> {
    const scope = resolveScope(input.page, input.branch);
    if (!scope) return { ok: false, code: "invalid", error: "Invalid page or branch." };

    const mode = normalizePresenceMode(input.mode);
    if (!mode) return { ok: false, code: "invalid", error: "Mode must be edit or view." };

    const clientId = input.clientId.trim();
    if (!clientId || clientId.length > CLIENT_ID_MAX_LENGTH) {
      return { ok: false, code: "invalid", error: "A client id is required." };
    }

    const unavailable: CreateSessionResult = { ok: false, code: "unavailable", error: "Presence is offline." };
    return this.mutateOr(unavailable, { ...scope, userId: input.userId }, (sql): CreateSessionResult => {
      const now = this.now();
      pruneExpiredLeases(sql, scope.page, scope.branch, now);

      if (hasActiveLease(sql, { userId: input.userId, clientId, ...scope }, now)) {
        return { ok: false, code: "duplicate", error: "This client already holds a session for the page." };
      }

      const lease: EditPresenceLease = {
        sessionId: this.generateSessionId(),
        clientId,
        userId: input.userId,
        username: input.username,
        page: scope.page,
        branch: scope.branch,
        mode,
        leaseExpiresAt: now + DEFAULT_LEASE_SECONDS * 1000,
        lastHeartbeat: now,
        createdAt: now
      };
      insertLease(sql, lease);

      return {
        ok: true,
        sessionId: lease.sessionId,
        leaseExpiresAt: lease.leaseExpiresAt,
        roster: { editors: listRosterEditors(sql, scope.page, scope.branch, now) }
      };
    });
  }

  async heartbeat(address: LeaseAddress): Promise<HeartbeatResult> {
    const now = this.now();
    const lastPing = this.heartbeatGuard.get(address.sessionId);
    if (lastPing !== undefined && now - lastPing < HEARTBEAT_THROTTLE_SECONDS * 1000) {
      return { status: "throttled" };
    }

    const scope = resolveScope(address.page, address.branch);
    if (!scope) return { status: "missing" };

    const result = await this.mutateOr<HeartbeatResult>(
      { status: "offline" },
      { sessionId: address.sessionId, ...scope },
      (sql) => {
        const lease = findLease(sql, { sessionId: address.sessionId, userId: address.userId, ...scope });
        if (!lease) return { status: "missing" };

        if (lease.leaseExpiresAt <= now) {
          deleteLease(sql, lease.sessionId);
          return { status: "expired" };
        }

        const target = Math.max(lease.leaseExpiresAt, now) + DEFAULT_LEASE_SECONDS * 1000;
        const leaseExpiresAt = Math.min(target, now + MAX_EXTENSION_AHEAD_SECONDS * 1000);
        extendLease(sql, lease.sessionId, leaseExpiresAt, now);
        return { status: "extended", leaseExpiresAt };
      }
    );

    if (result.status === "extended") {
      this.heartbeatGuard.set(address.sessionId, now);
    }
    return result;
  }

  async release(sessionId: string, userId: string): Promise<boolean> {
    this.heartbeatGuard.delete(sessionId);
    return this.mutateOr(false, { sessionId }, (sql) => deleteLease(sql, sessionId, userId) > 0);
  }

  /** `null` means presence storage is offline and no roster can be shown. */
  async getRoster(page: string, branch?: string): Promise<PresenceRoster | null> {
    const scope = resolveScope(page, branch);
    if (!scope) return { editors: [] };

    return this.mutateOr<PresenceRoster | null>(null, scope, (sql) => {
      const now = this.now();
      pruneExpiredLeases(sql, scope.page, scope.branch, now);
      return { editors: listRosterEditors(sql, scope.page, scope.branch, now) };
    });
  }

  /** The lease must match user, page, branch and mode and still be live. Expired leases are removed. */
  async validateSession(address: LeaseAddress & { mode?: string }): Promise<EditPresenceLease | null> {
    const scope = resolveScope(address.page, address.branch);
    const mode: PresenceMode | null = normalizePresenceMode(address.mode);
    if (!scope || !mode) return null;

    return this.mutateOr<EditPresenceLease | null>(null, { sessionId: address.sessionId, ...scope }, (sql) => {
      const lease = findLease(sql, { sessionId: address.sessionId, userId: address.userId, ...scope, mode });
      if (!lease) return null;
      if (lease.leaseExpiresAt <= this.now()) {
        deleteLease(sql, lease.sessionId);
        return null;
      }
      return lease;
    });
  }

  /** Looks a lease up by session and user only. */
  async getSession(sessionId: string, userId: string): Promise<EditPresenceLease | null> {
    return this.mutateOr<EditPresenceLease | null>(null, { sessionId }, (sql) => {
      const lease = findLease(sql, { sessionId, userId });
      if (!lease) return null;
      if (lease.leaseExpiresAt <= this.now()) {
        deleteLease(sql, lease.sessionId);
        return null;
      }
      return lease;
    });
  }

  /** Lightweight fields for request logs; empty when no live lease matches. */
  async presenceContext(address: LeaseAddress): Promise<Record<string, string>> {
    const scope = resolveScope(address.page, address.branch);
    if (!scope) return {};

    try {
      return await this.db.read((sql) => {
        const lease = findLease(sql, { sessionId: address.sessionId, userId: address.userId, ...scope });
        if (!lease || lease.leaseExpiresAt <= this.now()) return {};
        return { editSessionId: lease.sessionId, clientId: lease.clientId, mode: lease.mode };
      });
    } catch (error) {
      if (error instanceof StorageUnavailableError) return {};
      throw error;
    }
  }

  async purgeExpired(): Promise<number> {
    return this.mutateOr(0, {}, (sql) => purgeAllExpiredLeases(sql, this.now()));
  }
}
