import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from "fastify";
import type { SessionResolver } from "./sessionStore.js";

export const SESSION_COOKIE = "wiki_sid";

export interface AuthHooks {
  attachCurrentUser: preHandlerAsyncHookHandler;
  requireApiAuth: preHandlerAsyncHookHandler;
  requireApiAdmin: preHandlerAsyncHookHandler;
}

export const createAuthHooks = (resolver: SessionResolver): AuthHooks => {
  const attachCurrentUser = async (request: FastifyRequest): Promise<void> => {
    const sessionId = request.cookies[SESSION_COOKIE];
    if (!sessionId) return;

    const user = await resolver.resolve(sessionId);
    if (user) {
      request.currentUser = user;
    }
  };

  const requireApiAuth = async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> => {
    if (request.currentUser) return;
    return reply.code(401).send({ ok: false, error: "Authentication required." });
  };

  const requireApiAdmin = async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> => {
    if (!request.currentUser) {
      return reply.code(401).send({ ok: false, error: "Authentication required." });
    }
    if (!request.currentUser.isAdmin) {
      return reply.code(403).send({ ok: false, error: "Admin privileges required." });
    }
  };

  return { attachCurrentUser, requireApiAuth, requireApiAdmin };
};
