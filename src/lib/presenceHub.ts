import { randomUUID } from "node:crypto";
import type { CurrentUser, PresenceMode, WikiLogger } from "../types.js";
import type { EditPresenceService } from "./editPresenceService.js";
import { errorMessage } from "./errors.js";

export const HOUSEKEEPING_INTERVAL_MS = 30_000;

export const CLOSE_NORMAL = 1000;
export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_PROTOCOL_ERROR = 1002;
export const CLOSE_AUTH_REQUIRED = 4401;
export const CLOSE_PRESENCE_DISABLED = 4404;
export const CLOSE_INVALID_SESSION = 4409;

const SOCKET_OPEN = 1;

/** The subset of a `ws` WebSocket the hub talks to. */
export interface PresenceSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface PresenceConnection {
  readonly id: string;
  readonly page: string;
  readonly branch: string;
  readonly sessionId: string;
  readonly mode: PresenceMode;
  readonly userId: string;
  readonly username: string;
  readonly socket: PresenceSocket;
  active: boolean;
}

export interface ConnectInput {
  page: string;
  branch: string;
  sessionId: string;
  mode: string;
  user: CurrentUser;
  socket: PresenceSocket;
}

export type ServerMessage =
  | { type: "presence"; editors: Array<{ username: string; client_id: string }> }
  | { type: "goodbye"; reason: "expired" | "released" };

interface Room {
  readonly key: string;
  readonly page: string;
  readonly branch: string;
  readonly members: Set<PresenceConnection>;
  housekeeper: ReturnType<typeof setInterval> | null;
}

export interface PresenceHubOptions {
  presence: EditPresenceService;
  logger: WikiLogger;
  housekeepingIntervalMs?: number;
}

const roomKey = (page: string, branch: string): string => `${page}|${branch}`;

const parseClientMessageType = (raw: string): string | null => {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== "object" || !("type" in parsed)) return null;
    return typeof parsed.type === "string" ? parsed.type : null;
  } catch {
    return null;
  }
};

/**
 * Owns the in-process room registry. Registry structure only changes while
 * holding the hub lock; socket sends happen outside it on a snapshot.
 */
export class PresenceHub {
  private readonly presence: EditPresenceService;
  private readonly logger: WikiLogger;
  private readonly housekeepingIntervalMs: number;
  private readonly rooms = new Map<string, Room>();
  private lock: Promise<void> = Promise.resolve();

  constructor(options: PresenceHubOptions) {
    this.presence = options.presence;
    this.logger = options.logger;
    this.housekeepingIntervalMs = options.housekeepingIntervalMs ?? HOUSEKEEPING_INTERVAL_MS;
  }

  private withLock = async <T>(task: () => T): Promise<T> => {
    const current = this.lock;
    let release!: () => void;
    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await current;
    try {
      return task();
    } finally {
      release();
    }
  };

  private removeRoom(room: Room): void {
    if (room.housekeeper) {
      clearInterval(room.housekeeper);
      room.housekeeper = null;
    }
    this.rooms.delete(room.key);
  }

  private startHousekeeper(room: Room): void {
    if (room.housekeeper) return;

    room.housekeeper = setInterval(() => {
      void this.housekeep(room.key).catch((error) =>
        this.logger.warn({ room: room.key, err: errorMessage(error) }, "Presence housekeeping failed")
      );
    }, this.housekeepingIntervalMs);
    room.housekeeper.unref();
  }

  private async housekeep(key: string): Promise<void> {
    const room = await this.withLock(() => {
      const current = this.rooms.get(key);
      if (!current) return null;
      if (current.members.size === 0) {
        this.removeRoom(current);
        return null;
      }
      return current;
    });

    if (room) {
      await this.broadcast(room.page, room.branch);
    }
  }

  private send(connection: PresenceConnection, message: ServerMessage): boolean {
    if (connection.socket.readyState !== SOCKET_OPEN) return false;
    try {
      connection.socket.send(JSON.stringify(message));
      return true;
    } catch (error) {
      this.logger.warn({ connectionId: connection.id, err: errorMessage(error) }, "Failed to send presence update");
      return false;
    }
  }

  private async leave(connection: PresenceConnection): Promise<void> {
    await this.withLock(() => {
      const room = this.rooms.get(roomKey(connection.page, connection.branch));
      if (!room) return;
      room.members.delete(connection);
      if (room.members.size === 0) {
        this.removeRoom(room);
      }
    });
  }

  /** Validates the lease and joins its room; closes the socket with 4409 when the lease is not live. */
  async connect(input: ConnectInput): Promise<PresenceConnection | null> {
    const lease = await this.presence.validateSession({
      sessionId: input.sessionId,
      userId: input.user.id,
      page: input.page,
      branch: input.branch,
      mode: input.mode
    });
    if (!lease) {
      input.socket.close(CLOSE_INVALID_SESSION, "Invalid or expired session");
      return null;
    }

    const connection: PresenceConnection = {
      id: randomUUID(),
      page: lease.page,
      branch: lease.branch,
      sessionId: lease.sessionId,
      mode: lease.mode,
      userId: input.user.id,
      username: input.user.username,
      socket: input.socket,
      active: true
    };

    await this.withLock(() => {
      const key = roomKey(connection.page, connection.branch);
      let room = this.rooms.get(key);
      if (!room) {
        room = { key, page: connection.page, branch: connection.branch, members: new Set(), housekeeper: null };
        this.rooms.set(key, room);
      }
      room.members.add(connection);
      this.startHousekeeper(room);
    });

    await this.broadcast(connection.page, connection.branch);
    return connection;
  }

  /** Malformed frames and unknown message types are ignored. */
  async handleMessage(connection: PresenceConnection, raw: string): Promise<void> {
    if (!connection.active) return;

    const type = parseClientMessageType(raw);
    if (type === "ping") {
      const result = await this.presence.heartbeat({
        sessionId: connection.sessionId,
        userId: connection.userId,
        page: connection.page,
        branch: connection.branch
      });
      if (result.status === "missing" || result.status === "expired") {
        this.send(connection, { type: "goodbye", reason: "expired" });
        connection.socket.close(CLOSE_INVALID_SESSION, "Session expired");
        await this.disconnect(connection);
      }
      return;
    }

    if (type === "release") {
      connection.active = false;
      await this.presence.release(connection.sessionId, connection.userId);
      this.send(connection, { type: "goodbye", reason: "released" });
      connection.socket.close(CLOSE_NORMAL);
      await this.leave(connection);
      await this.broadcast(connection.page, connection.branch);
    }
  }

  /** Safe to call more than once; only the first call releases the lease. */
  async disconnect(connection: PresenceConnection): Promise<void> {
    if (!connection.active) return;
    connection.active = false;

    await this.presence.release(connection.sessionId, connection.userId);
    await this.leave(connection);
    await this.broadcast(connection.page, connection.branch);
  }

  async broadcast(page: string, branch: string): Promise<void> {
    const key = roomKey(page, branch);
    const members = await this.withLock(() => [...(this.rooms.get(key)?.members ?? [])]);
    if (members.length === 0) return;

    const roster = await this.presence.getRoster(page, branch);
    if (!roster) return;

    const message: ServerMessage = {
      type: "presence",
      editors: roster.editors.map((editor) => ({ username: editor.username, client_id: editor.clientId }))
    };

    const stale = members.filter((connection) => !this.send(connection, message));
    if (stale.length === 0) return;

    await this.withLock(() => {
      const room = this.rooms.get(key);
      if (!room) return;
      for (const connection of stale) {
        room.members.delete(connection);
      }
      if (room.members.size === 0) {
        this.removeRoom(room);
      }
    });
  }

  roomSnapshot(page: string, branch: string): { members: number; housekeeping: boolean } | null {
    const room = this.rooms.get(roomKey(page, branch));
    return room ? { members: room.members.size, housekeeping: room.housekeeper !== null } : null;
  }

  async shutdown(): Promise<void> {
    const connections = await this.withLock(() => {
      const all: PresenceConnection[] = [];
      for (const room of [...this.rooms.values()]) {
        all.push(...room.members);
        this.removeRoom(room);
      }
      return all;
    });

    for (const connection of connections) {
      connection.active = false;
      connection.socket.close(CLOSE_GOING_AWAY, "Server shutting down");
    }
  }
}
