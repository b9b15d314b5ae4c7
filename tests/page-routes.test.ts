import { afterEach, describe, expect, it, vi } from "vitest";
import type { WebSocket } from "ws";
import { type WikiApp, buildApp } from "../src/app.js";
import { SESSION_COOKIE } from "../src/lib/auth.js";
import type { SessionResolver } from "../src/lib/sessionStore.js";
import type { CurrentUser } from "../src/types.js";
import { openMemoryDatabase } from "./support/testKit.js";

const users: Record<string, CurrentUser> = {
  "sid-alice": { id: "u1", username: "alice", isAdmin: false },
  "sid-bob": { id: "u2", username: "bob", isAdmin: false },
  "sid-admin": { id: "u9", username: "root", isAdmin: true }
};

const sessions: SessionResolver = {
  resolve: async (sessionId) => users[sessionId] ?? null
};

const cookieFor = (sessionId: string) => ({ [SESSION_COOKIE]: sessionId });

const opened: WikiApp[] = [];

afterEach(async () => {
  await Promise.all(opened.splice(0).map((wiki) => wiki.app.close()));
});

const setup = async (editPresenceEnabled = true) => {
  const db = await openMemoryDatabase();
  const wiki = await buildApp({ db, sessions, editPresenceEnabled, logLevel: "silent" });
  opened.push(wiki);
  return wiki;
};

interface PresenceClient {
  ws: WebSocket;
  messages: unknown[];
  closed: Promise<{ code: number; reason: string }>;
}

const connectPresence = async (
  app: WikiApp["app"],
  query: string,
  sessionId?: string,
  onOpen?: (ws: WebSocket) => void
): Promise<PresenceClient> => {
  const messages: unknown[] = [];
  let settle: (value: { code: number; reason: string }) => void = () => undefined;
  const closed = new Promise<{ code: number; reason: string }>((resolve) => {
    settle = resolve;
  });

  const ws = await app.injectWS(
    `/ws/edit-presence${query}`,
    sessionId ? { headers: { cookie: `${SESSION_COOKIE}=${sessionId}` } } : {},
    {
      onInit: (socket) => {
        socket.on("message", (data) => messages.push(JSON.parse(data.toString())));
        socket.on("close", (code, reason) => settle({ code, reason: reason.toString() }));
      },
      ...(onOpen ? { onOpen } : {})
    }
  );
  return { ws, messages, closed };
};

const openEditSession = async (app: WikiApp["app"], clientId = "c1"): Promise<string> => {
  const response = await app.inject({
    method: "POST",
    url: "/api/pages/Home/edit-session",
    cookies: cookieFor("sid-alice"),
    payload: { branch: "main", mode: "edit", client_id: clientId }
  });
  const sessionId: unknown = response.json().sessionId;
  if (typeof sessionId !== "string") throw new Error("no session id");
  return sessionId;
};

const savePage = async (
  app: WikiApp["app"],
  title: string,
  payload: Record<string, unknown>,
  sessionId = "sid-alice",
  headers: Record<string, string> = {}
) =>
  app.inject({
    method: "PUT",
    url: `/api/pages/${encodeURIComponent(title)}`,
    cookies: cookieFor(sessionId),
    headers,
    payload
  });

describe("health", () => {
  it("opens its own database when none is passed in", async () => {
    const wiki = await buildApp({ sessions, logLevel: "silent" });
    opened.push(wiki);

    expect((await savePage(wiki.app, "Home", { content: "Hello" })).statusCode).toBe(201);
    expect((await wiki.engine.get("Home"))?.content).toBe("Hello");
  });

  it("reports ok", async () => {
    const { app } = await setup();
    const response = await app.inject({ method: "GET", url: "/health" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: "ok" });
  });
});

describe("PUT /api/pages/:title", () => {
  it("requires a signed-in user", async () => {
    const { app } = await setup();
    const response = await app.inject({ method: "PUT", url: "/api/pages/Home", payload: { content: "x" } });
    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ ok: false, error: "Authentication required." });
  });

  it("creates a page and serves it with an ETag", async () => {
    const { app } = await setup();
    const created = await savePage(app, "Home", { content: "Hello" });
    expect(created.statusCode).toBe(201);

    const body = created.json();
    expect(body).toMatchObject({ ok: true, created: true, page: { title: "Home", content: "Hello", author: "alice" } });
    expect(created.headers.etag).toBe(`"${body.page.updatedAt}"`);

    const fetched = await app.inject({ method: "GET", url: "/api/pages/Home" });
    expect(fetched.statusCode).toBe(200);
    expect(fetched.json().page.content).toBe("Hello");
    expect(fetched.headers.etag).toBe(created.headers.etag);

    const cached = await app.inject({
      method: "GET",
      url: "/api/pages/Home",
      headers: { "if-none-match": String(created.headers.etag) }
    });
    expect(cached.statusCode).toBe(304);
  });

  it("rejects saves based on a stale ETag", async () => {
    const { app } = await setup();
    const first = await savePage(app, "Home", { content: "Hello" });
    const staleTag = String(first.headers.etag);

    const second = await savePage(app, "Home", { content: "World" }, "sid-alice", { "if-match": staleTag });
    expect(second.statusCode).toBe(200);
    expect(second.json()).toMatchObject({ ok: true, created: false });

    const third = await savePage(app, "Home", { content: "Lost" }, "sid-bob", { "if-match": staleTag });
    expect(third.statusCode).toBe(412);
    expect(third.json()).toMatchObject({ ok: false, code: "conflict" });
    expect((await app.inject({ method: "GET", url: "/api/pages/Home" })).json().page.content).toBe("World");
  });

  it("validates the body", async () => {
    const { app } = await setup();
    expect((await savePage(app, "Home", { content: 42 })).statusCode).toBe(400);
    expect((await savePage(app, "Home", { content: "x", editPermission: "nobody" })).statusCode).toBe(400);
    expect((await savePage(app, "a:b", { content: "x" })).json()).toMatchObject({ ok: false, code: "invalid" });
  });

  it("enforces page permissions for non-admins", async () => {
    const { app } = await setup();
    await savePage(app, "Locked", { content: "v1", editPermission: "select_users", allowedUsers: ["alice"] });

    const denied = await savePage(app, "Locked", { content: "v2" }, "sid-bob");
    expect(denied.statusCode).toBe(403);

    expect((await savePage(app, "Locked", { content: "v2" }, "sid-alice")).statusCode).toBe(200);
    expect((await savePage(app, "Locked", { content: "v3" }, "sid-admin")).statusCode).toBe(200);
  });
});

describe("page reads", () => {
  it("returns 404 for pages that do not exist yet", async () => {
    const { app } = await setup();
    const response = await app.inject({ method: "GET", url: "/api/pages/Nowhere" });
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ ok: false, error: "Page does not exist yet." });
  });

  it("lists, searches and counts edits", async () => {
    const { app } = await setup();
    await savePage(app, "Help", { content: "Read me" });
    await savePage(app, "Other", { content: "help wanted" }, "sid-bob");

    const listed = await app.inject({ method: "GET", url: "/api/pages" });
    expect(listed.json().pages.map((page: { title: string }) => page.title).sort()).toEqual(["Help", "Other"]);

    const found = await app.inject({ method: "GET", url: "/api/search?q=help" });
    expect(found.json().results.map((page: { title: string }) => page.title)).toEqual(["Help", "Other"]);

    const stats = await app.inject({ method: "GET", url: "/api/users/alice/edits" });
    expect(stats.json()).toEqual({ ok: true, username: "alice", totalEdits: 1, pageEdits: { Help: 1 } });
  });
});

describe("branches", () => {
  it("forks, lists and deletes branches", async () => {
    const { app } = await setup();
    await savePage(app, "Home", { content: "Hello" });

    const forked = await app.inject({
      method: "POST",
      url: "/api/pages/Home/branches",
      cookies: cookieFor("sid-alice"),
      payload: { name: "draft" }
    });
    expect(forked.statusCode).toBe(201);
    expect(forked.json()).toMatchObject({
      ok: true,
      copiedHistory: 0,
      branch: { pageTitle: "Home", branchName: "draft", createdFrom: "main" },
      page: { branch: "draft", content: "Hello" }
    });

    const listed = await app.inject({ method: "GET", url: "/api/pages/Home/branches" });
    expect(listed.json().branches).toEqual(["main", "draft", "talk"]);
    expect(listed.json().records).toHaveLength(2);

    const all = await app.inject({ method: "GET", url: "/api/branches" });
    expect(all.json()).toEqual({ ok: true, branches: ["main", "draft", "talk"] });

    const duplicate = await app.inject({
      method: "POST",
      url: "/api/pages/Home/branches",
      cookies: cookieFor("sid-alice"),
      payload: { name: "draft" }
    });
    expect(duplicate.statusCode).toBe(409);

    const forbidden = await app.inject({ method: "DELETE", url: "/api/pages/Home/branches/draft", cookies: cookieFor("sid-alice") });
    expect(forbidden.statusCode).toBe(403);
    expect(forbidden.json()).toEqual({ ok: false, error: "Admin privileges required." });

    const removed = await app.inject({ method: "DELETE", url: "/api/pages/Home/branches/draft", cookies: cookieFor("sid-admin") });
    expect(removed.statusCode).toBe(200);
    expect((await app.inject({ method: "GET", url: "/api/pages/Home?branch=draft" })).statusCode).toBe(404);
  });
});

describe("admin page operations", () => {
  it("renames and deletes pages", async () => {
    const { app } = await setup();
    await savePage(app, "Home", { content: "Hello" });

    const renamed = await app.inject({
      method: "POST",
      url: "/api/pages/Home/rename",
      cookies: cookieFor("sid-admin"),
      payload: { newTitle: "Start" }
    });
    expect(renamed.json()).toEqual({ ok: true, title: "Start", renamed: true });
    expect((await app.inject({ method: "GET", url: "/api/pages/Home" })).statusCode).toBe(404);

    const deleted = await app.inject({ method: "DELETE", url: "/api/pages/Start", cookies: cookieFor("sid-admin") });
    expect(deleted.json()).toEqual({ ok: true, deletedBranches: 2 });

    const missing = await app.inject({ method: "DELETE", url: "/api/pages/Start", cookies: cookieFor("sid-admin") });
    expect(missing.statusCode).toBe(404);
  });
});

describe("history routes", () => {
  it("lists, shows, compares and restores versions", async () => {
    const { app } = await setup();
    await savePage(app, "Home", { content: "Hello" });
    await savePage(app, "Home", { content: "World", summary: "Reword" });

    const history = await app.inject({ method: "GET", url: "/api/history/Home" });
    expect(history.statusCode).toBe(200);
    expect(history.json().versions.map((entry: { displayNumber: number }) => entry.displayNumber)).toEqual([2, 1]);

    const version = await app.inject({ method: "GET", url: "/api/history/Home/1" });
    expect(version.json().version).toMatchObject({ index: 1, content: "Hello", editSummary: "Created page" });

    const compared = await app.inject({ method: "GET", url: "/api/history/Home/compare?from=1&to=0" });
    expect(compared.statusCode).toBe(200);
    expect(compared.json().diff.lines).toEqual([
      { type: "del", oldLineNumber: 1, newLineNumber: null, text: "Hello" },
      { type: "add", oldLineNumber: null, newLineNumber: 1, text: "World" }
    ]);

    expect((await app.inject({ method: "GET", url: "/api/history/Home/compare?from=a&to=0" })).statusCode).toBe(400);

    const restored = await app.inject({ method: "POST", url: "/api/history/Home/1/restore", cookies: cookieFor("sid-alice") });
    expect(restored.statusCode).toBe(200);
    expect(restored.json().page).toMatchObject({ content: "Hello", editSummary: "Created page" });

    const noop = await app.inject({ method: "POST", url: "/api/history/Home/0/restore", cookies: cookieFor("sid-alice") });
    expect(noop.statusCode).toBe(409);
  });

  it("returns 404 for unknown pages and versions", async () => {
    const { app } = await setup();
    await savePage(app, "Home", { content: "Hello" });

    expect((await app.inject({ method: "GET", url: "/api/history/Nowhere" })).statusCode).toBe(404);
    expect((await app.inject({ method: "GET", url: "/api/history/Home/7" })).statusCode).toBe(404);
  });
});

describe("edit sessions", () => {
  it("opens, rejects duplicates and releases", async () => {
    const { app } = await setup();

    const opened = await app.inject({
      method: "POST",
      url: "/api/pages/Home/edit-session",
      cookies: cookieFor("sid-alice"),
      payload: { branch: "main", mode: "edit", client_id: "c1" }
    });
    expect(opened.statusCode).toBe(200);
    const body = opened.json();
    expect(body.activeEditors).toEqual([{ username: "alice", clientId: "c1" }]);
    expect(typeof body.sessionId).toBe("string");

    const duplicate = await app.inject({
      method: "POST",
      url: "/api/pages/Home/edit-session",
      cookies: cookieFor("sid-alice"),
      payload: { client_id: "c1" }
    });
    expect(duplicate.statusCode).toBe(409);

    const released = await app.inject({
      method: "DELETE",
      url: `/api/pages/Home/edit-session/${body.sessionId}`,
      cookies: cookieFor("sid-alice")
    });
    expect(released.json()).toEqual({ ok: true, released: true });
  });

  it("rebroadcasts a released session to the page its lease belongs to", async () => {
    const { app } = await setup();
    const sessionId = await openEditSession(app);
    const client = await connectPresence(app, `?page=Home&branch=main&session_id=${sessionId}`, "sid-alice");
    await vi.waitFor(() => expect(client.messages).toHaveLength(1));

    const released = await app.inject({
      method: "DELETE",
      url: `/api/pages/Elsewhere/edit-session/${sessionId}`,
      cookies: cookieFor("sid-alice")
    });
    expect(released.json()).toEqual({ ok: true, released: true });

    await vi.waitFor(() => expect(client.messages).toHaveLength(2));
    expect(client.messages[1]).toEqual({ type: "presence", editors: [] });
  });

  it("rejects anonymous requests and bad input", async () => {
    const { app } = await setup();
    const anonymous = await app.inject({ method: "POST", url: "/api/pages/Home/edit-session", payload: { client_id: "c1" } });
    expect(anonymous.statusCode).toBe(401);

    const invalid = await app.inject({
      method: "POST",
      url: "/api/pages/Home/edit-session",
      cookies: cookieFor("sid-alice"),
      payload: { client_id: "" }
    });
    expect(invalid.statusCode).toBe(400);
  });
});

describe("GET /ws/edit-presence", () => {
  it("closes with 4404 when presence is disabled", async () => {
    const { app } = await setup(false);
    const client = await connectPresence(app, "?page=Home&session_id=s1", "sid-alice");
    expect(await client.closed).toEqual({ code: 4404, reason: "Presence disabled" });
  });

  it("closes with 1002 when page or session is missing", async () => {
    const { app } = await setup();
    const client = await connectPresence(app, "?page=Home", "sid-alice");
    expect(await client.closed).toEqual({ code: 1002, reason: "Missing required params" });
  });

  it("closes with 4401 for anonymous sockets", async () => {
    const { app } = await setup();
    const client = await connectPresence(app, "?page=Home&session_id=s1");
    expect(await client.closed).toEqual({ code: 4401, reason: "Authentication required" });
  });

  it("closes with 4409 when the lease is unknown", async () => {
    const { app } = await setup();
    const client = await connectPresence(app, "?page=Home&session_id=missing", "sid-alice");
    expect(await client.closed).toEqual({ code: 4409, reason: "Invalid or expired session" });
  });

  it("pushes the roster on join and handles a release sent before the join finished", async () => {
    const { app, presence } = await setup();
    const sessionId = await openEditSession(app);

    const client = await connectPresence(
      app,
      `?page=Home&branch=main&session_id=${sessionId}`,
      "sid-alice",
      (ws) => ws.send(JSON.stringify({ type: "release" }))
    );

    expect(await client.closed).toEqual({ code: 1000, reason: "" });
    expect(client.messages).toEqual([
      { type: "presence", editors: [{ username: "alice", client_id: "c1" }] },
      { type: "goodbye", reason: "released" }
    ]);
    expect(await presence.getRoster("Home", "main")).toEqual({ editors: [] });
  });

  it("releases the lease when the client goes away", async () => {
    const { app, presence, hub } = await setup();
    const sessionId = await openEditSession(app);
    const client = await connectPresence(app, `?page=Home&branch=main&session_id=${sessionId}`, "sid-alice");
    await vi.waitFor(() => expect(hub.roomSnapshot("Home", "main")).toEqual({ members: 1, housekeeping: true }));

    client.ws.close();

    await vi.waitFor(() => expect(hub.roomSnapshot("Home", "main")).toBeNull());
    expect(await presence.getRoster("Home", "main")).toEqual({ editors: [] });
  });
});

describe("storage outage", () => {
  it("answers 503 once the database is closed", async () => {
    const { app, db } = await setup();
    await savePage(app, "Home", { content: "Hello" });
    db.close();

    const write = await savePage(app, "Home", { content: "World" });
    expect(write.statusCode).toBe(503);
    expect(write.json()).toEqual({ ok: false, error: "Storage is temporarily unavailable." });

    const read = await app.inject({ method: "GET", url: "/api/pages/Home" });
    expect(read.statusCode).toBe(404);
  });
});
