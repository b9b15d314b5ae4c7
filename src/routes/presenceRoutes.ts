import type { FastifyInstance } from "fastify";
import type { RawData } from "ws";
import type { AuthHooks } from "../lib/auth.js";
import type { EditPresenceService } from "../lib/editPresenceService.js";
import { errorMessage } from "../lib/errors.js";
import {
  CLOSE_AUTH_REQUIRED,
  CLOSE_PRESENCE_DISABLED,
  CLOSE_PROTOCOL_ERROR,
  type PresenceConnection,
  type PresenceHub
} from "../lib/presenceHub.js";
import { MAIN_BRANCH, normalizeBranch } from "../lib/validation.js";
import { WRITE_RATE_LIMIT, asObject, readSingle } from "./routeHelpers.js";

export interface PresenceRouteDeps {
  presence: EditPresenceService;
  hub: PresenceHub;
  auth: AuthHooks;
  enabled: boolean;
}

const rawDataToString = (data: RawData): string => {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
};

export const registerPresenceRoutes = async (app: FastifyInstance, deps: PresenceRouteDeps): Promise<void> => {
  const { presence, hub, auth, enabled } = deps;

  app.post(
    "/api/pages/:title/edit-session",
    { preHandler: [auth.requireApiAuth], config: WRITE_RATE_LIMIT },
    async (request, reply) => {
      if (!enabled) {
        return reply.code(404).send({ ok: false, error: "Not found." });
      }
      const user = request.currentUser;
      if (!user) {
        return reply.code(401).send({ ok: false, error: "Authentication required." });
      }

      const params = asObject(request.params);
      const body = asObject(request.body);
      const page = readSingle(params.title);
      const result = await presence.createSession({
        page,
        branch: readSingle(body.branch),
        mode: readSingle(body.mode),
        clientId: readSingle(body.client_id),
        userId: user.id,
        username: user.username
      });

      if (!result.ok) {
        const statusCode = result.code === "duplicate" ? 409 : result.code === "unavailable" ? 503 : 400;
        return reply.code(statusCode).send({ ok: false, code: result.code, error: result.error });
      }

      const branch = normalizeBranch(readSingle(body.branch));
      await hub.broadcast(page.trim(), branch.ok ? branch.value : MAIN_BRANCH);

      return reply.send({
        ok: true,
        sessionId: result.sessionId,
        leaseExpiresAt: new Date(result.leaseExpiresAt).toISOString(),
        activeEditors: result.roster.editors
      });
    }
  );

  app.delete(
    "/api/pages/:title/edit-session/:sessionId",
    { preHandler: [auth.requireApiAuth], config: WRITE_RATE_LIMIT },
    async (request, reply) => {
      if (!enabled) {
        return reply.code(404).send({ ok: false, error: "Not found." });
      }
      const user = request.currentUser;
      if (!user) {
        return reply.code(401).send({ ok: false, error: "Authentication required." });
      }

      const params = asObject(request.params);
      const query = asObject(request.query);
      const sessionId = readSingle(params.sessionId);

      // The lease knows where it lives; the URL is only a fallback.
      const lease = await presence.getSession(sessionId, user.id);
      const queryBranch = normalizeBranch(readSingle(query.branch));
      const page = lease?.page ?? readSingle(params.title).trim();
      const branch = lease?.branch ?? (queryBranch.ok ? queryBranch.value : MAIN_BRANCH);
      const logContext = await presence.presenceContext({ sessionId, userId: user.id, page, branch });

      const released = await presence.release(sessionId, user.id);
      request.log.info({ ...logContext, page, branch, released }, "Edit session release requested");
      await hub.broadcast(page, branch);

      return reply.send({ ok: true, released });
    }
  );

  app.get("/ws/edit-presence", { websocket: true }, (socket, request) => {
    if (!enabled) {
      socket.close(CLOSE_PRESENCE_DISABLED, "Presence disabled");
      return;
    }

    const query = asObject(request.query);
    const page = readSingle(query.page);
    const sessionId = readSingle(query.session_id);
    if (!page || !sessionId) {
      socket.close(CLOSE_PROTOCOL_ERROR, "Missing required params");
      return;
    }

    const user = request.currentUser;
    if (!user) {
      socket.close(CLOSE_AUTH_REQUIRED, "Authentication required");
      return;
    }

    const ready: Promise<PresenceConnection | null> = hub.connect({
      page,
      branch: readSingle(query.branch),
      sessionId,
      mode: readSingle(query.mode) || "edit",
      user,
      socket
    });

    // Frames are handled strictly in arrival order, after the join completes.
    let queue: Promise<unknown> = ready.catch((error) =>
      request.log.warn({ err: errorMessage(error), page }, "Edit presence join failed")
    );
    const enqueue = (task: (connection: PresenceConnection) => Promise<void>): void => {
      queue = queue
        .then(() => ready)
        .then((connection) => (connection ? task(connection) : undefined))
        .catch((error) => request.log.warn({ err: errorMessage(error), page }, "Edit presence socket error"));
    };

    socket.on("message", (data: RawData) => {
      const raw = rawDataToString(data);
      enqueue((connection) => hub.handleMessage(connection, raw));
    });
    socket.on("close", () => {
      enqueue((connection) => hub.disconnect(connection));
    });
  });
};
