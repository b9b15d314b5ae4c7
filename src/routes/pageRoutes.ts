import type { FastifyInstance } from "fastify";
import type { AuthHooks } from "../lib/auth.js";
import { canEdit } from "../lib/permissions.js";
import { isEditPermission } from "../lib/validation.js";
import type { VersioningEngine } from "../lib/versioningEngine.js";
import type { CurrentUser, EditPermission, WikiPage } from "../types.js";
import {
  READ_RATE_LIMIT,
  WRITE_RATE_LIMIT,
  asObject,
  createPageEtag,
  ifNoneMatchMatches,
  readIfMatchTimestamp,
  readLimit,
  readMany,
  readSingle,
  sendFailure
} from "./routeHelpers.js";

export interface PageRouteDeps {
  engine: VersioningEngine;
  auth: AuthHooks;
}

/** Admins bypass the per-page permission tiers. */
export const userMayEdit = async (engine: VersioningEngine, page: WikiPage, user: CurrentUser): Promise<boolean> => {
  if (user.isAdmin) return true;
  const stats = await engine.getUserEditStats(user.username);
  return canEdit(page.editPermission, page.allowedUsers, stats.totalEdits, user.username);
};

export const registerPageRoutes = async (app: FastifyInstance, deps: PageRouteDeps): Promise<void> => {
  const { engine, auth } = deps;

  app.get("/api/pages", { config: READ_RATE_LIMIT }, async (request, reply) => {
    const query = asObject(request.query);
    const branch = readSingle(query.branch);
    const limit = readLimit(query.limit, 100, 500);
    const pages = await engine.listPagesByBranch(branch, limit);
    return reply.send({ ok: true, pages });
  });

  app.get("/api/pages/:title", { config: READ_RATE_LIMIT }, async (request, reply) => {
    const params = asObject(request.params);
    const query = asObject(request.query);
    const page = await engine.get(readSingle(params.title), readSingle(query.branch));
    if (!page) {
      return reply.code(404).send({ ok: false, error: "Page does not exist yet." });
    }

    const etag = createPageEtag(page.updatedAt);
    reply.header("ETag", etag);
    reply.header("Cache-Control", "no-cache");
    if (ifNoneMatchMatches(request.headers["if-none-match"], etag)) {
      return reply.code(304).send();
    }

    return reply.send({ ok: true, page });
  });

  app.put(
    "/api/pages/:title",
    { preHandler: [auth.requireApiAuth], config: WRITE_RATE_LIMIT },
    async (request, reply) => {
      const user = request.currentUser;
      if (!user) {
        return reply.code(401).send({ ok: false, error: "Authentication required." });
      }

      const params = asObject(request.params);
      const body = asObject(request.body);
      const title = readSingle(params.title);
      const branch = readSingle(body.branch) || readSingle(asObject(request.query).branch);

      const content = body.content;
      if (typeof content !== "string") {
        return reply.code(400).send({ ok: false, error: "content must be a string." });
      }

      const requestedPermission = body.editPermission;
      let editPermission: EditPermission | undefined;
      if (requestedPermission !== undefined) {
        if (!isEditPermission(requestedPermission)) {
          return reply.code(400).send({ ok: false, error: "Unknown edit permission." });
        }
        editPermission = requestedPermission;
      }

      const existing = await engine.get(title, branch);
      if (existing && !(await userMayEdit(engine, existing, user))) {
        return reply.code(403).send({ ok: false, error: "You may not edit this page." });
      }

      const expectedUpdatedAt = readIfMatchTimestamp(request.headers["if-match"]);
      const summary = readSingle(body.summary);
      const result = await engine.update({
        title,
        branch,
        content,
        author: user.username,
        summary,
        ...(editPermission ? { editPermission } : {}),
        ...(body.allowedUsers !== undefined ? { allowedUsers: readMany(body.allowedUsers) } : {}),
        ...(expectedUpdatedAt ? { expectedUpdatedAt } : {})
      });
      if (!result.ok) {
        if (expectedUpdatedAt && result.code === "conflict") {
          return reply.code(412).send({ ok: false, code: result.code, error: result.error });
        }
        return sendFailure(reply, result);
      }

      reply.header("ETag", createPageEtag(result.page.updatedAt));
      return reply.code(result.created ? 201 : 200).send({ ok: true, created: result.created, page: result.page });
    }
  );

  app.post(
    "/api/pages/:title/rename",
    { preHandler: [auth.requireApiAdmin], config: WRITE_RATE_LIMIT },
    async (request, reply) => {
      const params = asObject(request.params);
      const body = asObject(request.body);
      const result = await engine.rename(readSingle(params.title), readSingle(body.newTitle));
      if (!result.ok) {
        return sendFailure(reply, result);
      }
      return reply.send({ ok: true, title: result.title, renamed: result.renamed });
    }
  );

  app.delete(
    "/api/pages/:title",
    { preHandler: [auth.requireApiAdmin], config: WRITE_RATE_LIMIT },
    async (request, reply) => {
      const params = asObject(request.params);
      const result = await engine.deletePage(readSingle(params.title));
      if (!result.ok) {
        return sendFailure(reply, result);
      }
      return reply.send({ ok: true, deletedBranches: result.deletedBranches });
    }
  );

  app.get("/api/pages/:title/branches", { config: READ_RATE_LIMIT }, async (request, reply) => {
    const params = asObject(request.params);
    const title = readSingle(params.title);
    const [branches, records] = await Promise.all([engine.listBranches(title), engine.listBranchRecords(title)]);
    return reply.send({ ok: true, branches, records });
  });

  app.post(
    "/api/pages/:title/branches",
    { preHandler: [auth.requireApiAuth], config: WRITE_RATE_LIMIT },
    async (request, reply) => {
      const params = asObject(request.params);
      const body = asObject(request.body);
      const result = await engine.fork(readSingle(params.title), readSingle(body.name), readSingle(body.source));
      if (!result.ok) {
        return sendFailure(reply, result);
      }
      return reply.code(201).send({
        ok: true,
        branch: result.branch,
        page: result.page,
        copiedHistory: result.copiedHistory
      });
    }
  );

  app.delete(
    "/api/pages/:title/branches/:branch",
    { preHandler: [auth.requireApiAdmin], config: WRITE_RATE_LIMIT },
    async (request, reply) => {
      const params = asObject(request.params);
      const result = await engine.deleteBranch(readSingle(params.title), readSingle(params.branch));
      if (!result.ok) {
        return sendFailure(reply, result);
      }
      return reply.send({ ok: true });
    }
  );

  app.get("/api/branches", { config: READ_RATE_LIMIT }, async (_request, reply) => {
    const branches = await engine.listAllBranches();
    return reply.send({ ok: true, branches });
  });

  app.get("/api/search", { config: READ_RATE_LIMIT }, async (request, reply) => {
    const query = asObject(request.query);
    const results = await engine.searchPages(readSingle(query.q), readSingle(query.branch));
    return reply.send({ ok: true, results });
  });

  app.get("/api/users/:username/edits", { config: READ_RATE_LIMIT }, async (request, reply) => {
    const params = asObject(request.params);
    const stats = await engine.getUserEditStats(readSingle(params.username));
    return reply.send({ ok: true, ...stats });
  });
};
