import type { FastifyInstance } from "fastify";
import type { AuthHooks } from "../lib/auth.js";
import { parseVersionIndex } from "../lib/validation.js";
import type { VersioningEngine } from "../lib/versioningEngine.js";
import { userMayEdit } from "./pageRoutes.js";
import { READ_RATE_LIMIT, WRITE_RATE_LIMIT, asObject, readLimit, readSingle, sendFailure } from "./routeHelpers.js";

export interface HistoryRouteDeps {
  engine: VersioningEngine;
  auth: AuthHooks;
}

export const registerHistoryRoutes = async (app: FastifyInstance, deps: HistoryRouteDeps): Promise<void> => {
  const { engine, auth } = deps;

  app.get("/api/history/:title", { config: READ_RATE_LIMIT }, async (request, reply) => {
    const params = asObject(request.params);
    const query = asObject(request.query);
    const title = readSingle(params.title);
    const branch = readSingle(query.branch);

    const versions = await engine.listVersions(title, branch, readLimit(query.limit, 50, 500));
    if (versions.length === 0) {
      return reply.code(404).send({ ok: false, error: "Page does not exist yet." });
    }
    return reply.send({ ok: true, title, branch: branch || "main", versions });
  });

  // Registered before /:index so the static segment wins.
  app.get("/api/history/:title/compare", { config: READ_RATE_LIMIT }, async (request, reply) => {
    const params = asObject(request.params);
    const query = asObject(request.query);
    const fromIndex = parseVersionIndex(readSingle(query.from));
    const toIndex = parseVersionIndex(readSingle(query.to));
    if (fromIndex === null || toIndex === null) {
      return reply.code(400).send({ ok: false, error: "from and to must be version indices." });
    }

    const result = await engine.compareVersions(readSingle(params.title), readSingle(query.branch), fromIndex, toIndex);
    if (!result.ok) {
      return sendFailure(reply, result);
    }
    return reply.send({ ok: true, from: result.from, to: result.to, diff: result.diff });
  });

  app.get("/api/history/:title/:index", { config: READ_RATE_LIMIT }, async (request, reply) => {
    const params = asObject(request.params);
    const query = asObject(request.query);
    const index = parseVersionIndex(readSingle(params.index));
    if (index === null) {
      return reply.code(400).send({ ok: false, error: "Version index must be a non-negative integer." });
    }

    const version = await engine.getVersion(readSingle(params.title), readSingle(query.branch), index);
    if (!version) {
      return reply.code(404).send({ ok: false, error: "Version not found." });
    }
    return reply.send({ ok: true, version });
  });

  app.post(
    "/api/history/:title/:index/restore",
    { preHandler: [auth.requireApiAuth], config: WRITE_RATE_LIMIT },
    async (request, reply) => {
      const user = request.currentUser;
      if (!user) {
        return reply.code(401).send({ ok: false, error: "Authentication required." });
      }

      const params = asObject(request.params);
      const query = asObject(request.query);
      const title = readSingle(params.title);
      const branch = readSingle(query.branch);
      const index = parseVersionIndex(readSingle(params.index));
      if (index === null) {
        return reply.code(400).send({ ok: false, error: "Version index must be a non-negative integer." });
      }

      const current = await engine.get(title, branch);
      if (current && !(await userMayEdit(engine, current, user))) {
        return reply.code(403).send({ ok: false, error: "You may not edit this page." });
      }

      const result = await engine.restoreVersion(title, branch, index);
      if (!result.ok) {
        return sendFailure(reply, result);
      }

      request.log.info({ title, branch: result.page.branch, index, by: user.username }, "Version restored");
      return reply.send({ ok: true, page: result.page });
    }
  );
};
