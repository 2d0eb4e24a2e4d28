import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import type { DispatchResult } from "../src/dispatch/index.js";
import { RecordingDispatcher, testApp } from "./helpers.js";

const MIN = 60 * 1000;

function json(payload: Record<string, string>) {
  return { headers: { "content-type": "application/json" }, payload: JSON.stringify(payload) };
}

async function registerSession(app: FastifyInstance, sessionId: string, handle: string, cwd = "") {
  const res = await app.inject({ method: "POST", url: "/session", ...json({ session_id: sessionId, terminal_session: handle, cwd }) });
  expect(res.statusCode).toBe(200);
}

async function registerAction(app: FastifyInstance, body: Record<string, string>) {
  const res = await app.inject({ method: "POST", url: "/register-action", ...json(body) });
  expect(res.statusCode).toBe(200);
}

describe("control-plane", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("approve records the verdict, types the keystroke and is used once", async () => {
    const { app, dispatcher } = await testApp();
    await registerSession(app, "S1", "T1");
    await registerAction(app, { token: "A1", session_id: "S1", notification_type: "permission_prompt", message: "run ls" });

    const approved = await app.inject({ method: "GET", url: "/approve/A1" });
    expect(approved.statusCode).toBe(200);
    expect(approved.json()).toEqual({ ok: true, verdict: "allow", sent: "y", delivered: true, dispatch: "ok" });
    expect(dispatcher.calls).toEqual([{ handle: "T1", text: "y" }]);

    const decision = await app.inject({ method: "GET", url: "/decision/A1" });
    expect(decision.json()).toEqual({ ok: true, decision: "allow" });

    const again = await app.inject({ method: "GET", url: "/approve/A1" });
    expect(again.statusCode).toBe(200);
    expect(again.json()).toEqual({ ok: true, verdict: "allow", alreadyResolved: true, reason: "expired_or_used" });
    expect(dispatcher.calls).toHaveLength(1);

    await app.close();
  });

  test("a deny after an approve keeps the first verdict", async () => {
    const { app } = await testApp();
    await registerAction(app, { token: "A1", session_id: "S1" });
    await app.inject({ method: "GET", url: "/approve/A1" });

    const denied = await app.inject({ method: "GET", url: "/deny/A1" });
    expect(denied.json()).toMatchObject({ ok: true, verdict: "allow", alreadyResolved: true });
    expect((await app.inject({ method: "GET", url: "/decision/A1" })).json()).toEqual({ ok: true, decision: "allow" });

    await app.close();
  });

  test("a decided token cannot be registered again", async () => {
    const { app, dispatcher, store } = await testApp();
    await registerSession(app, "S1", "T1");
    await registerAction(app, { token: "R1", session_id: "S1" });
    await app.inject({ method: "GET", url: "/approve/R1" });

    const again = await app.inject({ method: "POST", url: "/register-action", ...json({ token: "R1", session_id: "S1" }) });
    expect(again.statusCode).toBe(409);
    expect(again.json()).toEqual({ ok: false, error: "token_already_decided" });
    expect(store.peekAction("R1")).toBeNull();

    const denied = await app.inject({ method: "GET", url: "/deny/R1" });
    expect(denied.json()).toEqual({ ok: true, verdict: "allow", alreadyResolved: true, reason: "expired_or_used" });
    expect(dispatcher.calls).toEqual([{ handle: "T1", text: "y" }]);

    await app.close();
  });

  test("concurrent approve, deny and custom text resolve a token once", async () => {
    const dispatcher = new RecordingDispatcher(
      () => new Promise<DispatchResult>((resolve) => setTimeout(() => resolve({ outcome: "ok" }), 20)),
    );
    const { app } = await testApp({ dispatcher });
    await registerSession(app, "S1", "T1");
    await registerAction(app, { token: "C1", session_id: "S1", notification_type: "permission_prompt" });

    const responses = await Promise.all([
      app.inject({ method: "GET", url: "/approve/C1" }),
      app.inject({ method: "GET", url: "/deny/C1" }),
      app.inject({ method: "POST", url: "/control/C1", headers: { "content-type": "text/plain" }, payload: "go on" }),
      app.inject({ method: "GET", url: "/approve/C1" }),
    ]);

    const winners = responses.filter((r) => r.statusCode === 200 && "sent" in r.json());
    expect(winners).toHaveLength(1);
    expect(dispatcher.calls).toHaveLength(1);
    expect(dispatcher.calls[0]?.text).toBe(winners[0]?.json().sent);

    await app.close();
  });

  test("deny sends n and reports missing terminals without failing", async () => {
    const { app, dispatcher } = await testApp();
    await registerAction(app, { token: "D1", session_id: "nobody" });

    const res = await app.inject({ method: "GET", url: "/deny/D1" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, verdict: "deny", sent: "n", delivered: false, dispatch: "session_not_found" });
    expect(dispatcher.calls).toHaveLength(0);
    expect((await app.inject({ method: "GET", url: "/decision/D1" })).json()).toEqual({ ok: true, decision: "deny" });

    await app.close();
  });

  test("dispatch failures never fail the resolution", async () => {
    const dispatcher = new RecordingDispatcher(async () => {
      throw new Error("osascript missing");
    });
    const { app } = await testApp({ dispatcher });
    await registerSession(app, "S1", "T1");
    await registerAction(app, { token: "A1", session_id: "S1" });

    const res = await app.inject({ method: "GET", url: "/approve/A1" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, verdict: "allow", sent: "y", delivered: false, dispatch: "failed" });
    expect((await app.inject({ method: "GET", url: "/decision/A1" })).json()).toEqual({ ok: true, decision: "allow" });

    await app.close();
  });

  test("unknown tokens report expired_or_used", async () => {
    const { app } = await testApp();
    const res = await app.inject({ method: "GET", url: "/approve/never-issued" });
    expect(res.statusCode).toBe(410);
    expect(res.json()).toEqual({ ok: false, error: "expired_or_used" });
    await app.close();
  });

  test("custom text without a registered session is consumed with session_not_found", async () => {
    const { app, dispatcher } = await testApp();
    await registerAction(app, { token: "A2", session_id: "ghost", notification_type: "idle_prompt" });

    const res = await app.inject({
      method: "POST",
      url: "/control/A2",
      headers: { "content-type": "text/plain" },
      payload: "ls -la",
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, sent: "ls -la", delivered: false, dispatch: "session_not_found" });
    expect(dispatcher.calls).toHaveLength(0);

    const page = await app.inject({ method: "GET", url: "/control/A2" });
    expect(page.statusCode).toBe(410);

    const again = await app.inject({
      method: "POST",
      url: "/control/A2",
      headers: { "content-type": "text/plain" },
      payload: "ls -la",
    });
    expect(again.statusCode).toBe(410);
    expect(again.json()).toEqual({ ok: false, error: "expired_or_used" });
    // Custom text is not a verdict.
    expect((await app.inject({ method: "GET", url: "/decision/A2" })).json()).toEqual({ ok: true, decision: null });

    await app.close();
  });

  test("custom text is trimmed and typed into the mapped terminal", async () => {
    const { app, dispatcher } = await testApp();
    await registerSession(app, "S1", "%4");
    await registerAction(app, { token: "A3", session_id: "S1", notification_type: "elicitation_dialog" });

    const res = await app.inject({ method: "POST", url: "/control/A3", ...json({ text: "  use option 2 \n" }) });
    expect(res.json()).toEqual({ ok: true, sent: "use option 2", delivered: true, dispatch: "ok" });
    expect(dispatcher.calls).toEqual([{ handle: "%4", text: "use option 2" }]);

    await app.close();
  });

  test("blank custom text is rejected and the token stays pending", async () => {
    const { app } = await testApp();
    await registerAction(app, { token: "A5", session_id: "S1", notification_type: "permission_prompt" });

    const res = await app.inject({
      method: "POST",
      url: "/control/A5",
      headers: { "content-type": "text/plain" },
      payload: "   \n\t ",
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ ok: false, error: "empty_input" });

    const page = await app.inject({ method: "GET", url: "/control/A5" });
    expect(page.statusCode).toBe(200);

    await app.close();
  });

  test("resolution page escapes operator strings and falls back to the cwd name", async () => {
    const { app } = await testApp();
    await registerSession(app, "S1", "T1", "/home/dev/my-app");
    await registerAction(app, {
      token: "A6",
      session_id: "S1",
      notification_type: "permission_prompt",
      message: `<script>alert("x")</script>`,
      tool: "Bash",
    });

    const res = await app.inject({ method: "GET", url: "/control/A6" });
    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(res.payload).toContain("&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;");
    expect(res.payload).not.toContain(`<script>alert("x")</script>`);
    expect(res.payload).toContain(`<div class="meta">my-app &middot; permission prompt <span id="age"></span></div>`);
    expect(res.payload).toContain(`<body data-token="A6" data-created-at="1000000">`);
    expect(res.payload).toContain("<h1>Permission Required</h1>");

    // Rendering does not consume the token.
    expect((await app.inject({ method: "GET", url: "/approve/A6" })).statusCode).toBe(200);

    await app.close();
  });

  test("expired tokens render the expired page after a sweep", async () => {
    const { app, store, clock } = await testApp();
    await registerAction(app, { token: "A4", session_id: "S1", notification_type: "permission_prompt" });

    clock.now += 30 * MIN + 1;
    store.sweep();

    const page = await app.inject({ method: "GET", url: "/control/A4" });
    expect(page.statusCode).toBe(410);
    expect(page.payload).toContain("<h1>Link Expired</h1>");
    expect(store.peekAction("A4")).toBeNull();
    expect((await app.inject({ method: "GET", url: "/decision/A4" })).json()).toEqual({ ok: true, decision: null });

    await app.close();
  });

  test("unresolved tokens poll as undecided", async () => {
    const { app } = await testApp();
    await registerAction(app, { token: "A7", session_id: "S1" });
    for (let i = 0; i < 3; i++) {
      const res = await app.inject({ method: "GET", url: "/decision/A7" });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ ok: true, decision: null });
    }
    await app.close();
  });

  test("removing a session is idempotent and stops dispatch to it", async () => {
    const { app, dispatcher } = await testApp();
    await registerSession(app, "S1", "T1");
    expect((await app.inject({ method: "DELETE", url: "/session/S1" })).json()).toEqual({ ok: true });
    expect((await app.inject({ method: "DELETE", url: "/session/S1" })).statusCode).toBe(200);

    await registerAction(app, { token: "A8", session_id: "S1" });
    const res = await app.inject({ method: "GET", url: "/approve/A8" });
    expect(res.json()).toMatchObject({ dispatch: "session_not_found" });
    expect(dispatcher.calls).toHaveLength(0);

    await app.close();
  });

  test("registration validates only the required ids", async () => {
    const { app, store } = await testApp();

    const noSession = await app.inject({ method: "POST", url: "/session", ...json({ cwd: "/x" }) });
    expect(noSession.statusCode).toBe(400);
    expect(noSession.json()).toEqual({ ok: false, error: "missing_session_id" });

    const noToken = await app.inject({ method: "POST", url: "/register-action", ...json({ session_id: "S1" }) });
    expect(noToken.statusCode).toBe(400);
    expect(noToken.json()).toEqual({ ok: false, error: "missing_token" });

    // Legacy field names are accepted; unknown fields are ignored.
    await app.inject({ method: "POST", url: "/session", ...json({ session_id: "S2", iterm_session: "w0t0p0:ABC", extra: "x" }) });
    expect(store.getSession("S2")).toMatchObject({ terminalHandle: "w0t0p0:ABC", cwd: "" });
    await registerAction(app, { uuid: "U1", session_id: "S2", notification_type: "stop" });
    expect(store.peekAction("U1")).toMatchObject({ kind: "completion", message: "", project: "", tool: "" });

    await app.close();
  });

  test("long messages are truncated", async () => {
    const { app, store } = await testApp();
    await registerAction(app, { token: "L1", session_id: "S1", message: "x".repeat(2500) });
    const msg = store.peekAction("L1")?.message ?? "";
    expect(msg.length).toBe(2000);
    expect(msg.endsWith("x...")).toBe(true);
    await app.close();
  });

  test("health, CORS, malformed bodies and unknown routes", async () => {
    const { app } = await testApp();

    const health = await app.inject({ method: "GET", url: "/health" });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({ ok: true });
    expect(health.headers["access-control-allow-origin"]).toBe("*");

    const preflight = await app.inject({ method: "OPTIONS", url: "/approve/A1" });
    expect(preflight.statusCode).toBe(204);
    expect(preflight.headers["access-control-allow-methods"]).toBe("GET, POST, DELETE, OPTIONS");

    const bad = await app.inject({
      method: "POST",
      url: "/session",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });
    expect(bad.statusCode).toBe(400);
    expect(bad.json()).toMatchObject({ ok: false, error: "bad_request" });

    const missing = await app.inject({ method: "GET", url: "/nope" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ ok: false, error: "not_found" });

    await app.close();
  });
});
