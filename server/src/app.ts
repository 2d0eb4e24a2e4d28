import Fastify from "fastify";
import helmet from "@fastify/helmet";
import compress from "@fastify/compress";
import type { FastifyError, FastifyInstance } from "fastify";
import path from "node:path";
import { defaultConfig, type Config } from "./config.js";
import { createDispatcher, type DispatchResult, type KeystrokeDispatcher } from "./dispatch/index.js";
import { loadControlTemplate, renderControlPage, renderExpiredPage } from "./pages.js";
import { parseDecisionKind, type ActionRecord } from "./store/action_store.js";
import { ControlStore } from "./store/control_store.js";
import type { Verdict } from "./store/decision_channel.js";
import { truncate } from "./text.js";

export type AppConfig = {
  store?: ControlStore;
  retention?: Partial<Config["retention"]>;
  dispatcher?: KeystrokeDispatcher;
  dispatch?: Partial<Config["dispatch"]>;
  templatePath?: string;
  // Arm the periodic sweep; tests that drive the clock themselves turn it off.
  sweep?: boolean;
};

export const MAX_MESSAGE_CHARS = 2000;

type TokenParams = { Params: { token: string } };

function field(body: unknown, key: string): string {
  if (typeof body !== "object" || body === null) return "";
  const v: unknown = Reflect.get(body, key);
  return typeof v === "string" ? v : "";
}

function flag(name: string): boolean {
  const v = String(process.env[name] ?? "").trim().toLowerCase();
  return v === "1" || v === "true";
}

export async function buildApp(cfg: AppConfig = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    bodyLimit: 64 * 1024,
  });

  if (!flag("RG_DISABLE_HELMET")) {
    // The control page runs an inline script and is opened from other origins (ntfy, tunnels).
    await app.register(helmet, { contentSecurityPolicy: false, crossOriginResourcePolicy: { policy: "cross-origin" } });
  }
  if (!flag("RG_DISABLE_COMPRESS")) await app.register(compress);

  const defaults = defaultConfig();
  const retention = { ...defaults.retention, ...cfg.retention };
  const dispatchCfg = { ...defaults.dispatch, ...cfg.dispatch };
  const store =
    cfg.store ??
    new ControlStore({
      actionTtlMs: retention.actionTtlMs,
      sessionRetentionMs: retention.sessionRetentionMs,
      sweepIntervalMs: retention.sweepIntervalMs,
    });
  const dispatcher = cfg.dispatcher ?? createDispatcher(dispatchCfg.backend, dispatchCfg.timeoutMs);
  const template = loadControlTemplate(cfg.templatePath);

  if (cfg.sweep !== false) store.start();
  app.addHook("onClose", async () => store.stop());

  // Reached through operator-controlled tunnels, so any origin may call the API.
  app.addHook("onSend", async (_req, reply, payload) => {
    reply.header("access-control-allow-origin", "*");
    return payload;
  });

  app.options("*", async (_req, reply) => {
    return reply
      .code(204)
      .header("access-control-allow-methods", "GET, POST, DELETE, OPTIONS")
      .header("access-control-allow-headers", "Content-Type")
      .send();
  });

  app.setErrorHandler<FastifyError>(async (err, req, reply) => {
    const status = typeof err.statusCode === "number" ? err.statusCode : 500;
    if (status < 500) return reply.code(status).send({ ok: false, error: "bad_request", message: err.message });
    console.error(`[remote-gate] ${req.method} ${req.url} failed: ${err.message}`);
    return reply.code(500).send({ ok: false, error: "internal_error" });
  });

  app.setNotFoundHandler(async (_req, reply) => {
    return reply.code(404).send({ ok: false, error: "not_found" });
  });

  async function deliver(action: Readonly<ActionRecord>, text: string): Promise<DispatchResult> {
    const session = store.getSession(action.sessionId);
    if (!session || !session.terminalHandle) {
      console.warn(`[remote-gate] no terminal for session ${action.sessionId || "(none)"}; keystroke not sent`);
      return { outcome: "session_not_found" };
    }
    let r: DispatchResult;
    try {
      r = await dispatcher.send(session.terminalHandle, text);
    } catch (e) {
      r = { outcome: "failed", error: e instanceof Error ? e.message : String(e) };
    }
    if (r.outcome !== "ok") {
      console.warn(`[remote-gate] ${dispatcher.backend} dispatch to ${session.terminalHandle}: ${r.outcome}${r.error ? ` (${r.error})` : ""}`);
    }
    return r;
  }

  app.post("/session", async (req, reply) => {
    const sessionId = field(req.body, "session_id").trim();
    if (!sessionId) return reply.code(400).send({ ok: false, error: "missing_session_id" });
    store.registerSession({
      sessionId,
      terminalHandle: field(req.body, "terminal_session") || field(req.body, "iterm_session"),
      cwd: field(req.body, "cwd"),
    });
    return { ok: true };
  });

  app.delete<{ Params: { id: string } }>("/session/:id", async (req) => {
    store.removeSession(req.params.id);
    return { ok: true };
  });

  app.post("/register-action", async (req, reply) => {
    const token = (field(req.body, "token") || field(req.body, "uuid")).trim();
    if (!token) return reply.code(400).send({ ok: false, error: "missing_token" });
    const accepted = store.registerAction({
      token,
      sessionId: field(req.body, "session_id"),
      kind: parseDecisionKind(field(req.body, "notification_type")),
      message: truncate(field(req.body, "message"), MAX_MESSAGE_CHARS),
      project: field(req.body, "project"),
      tool: field(req.body, "tool"),
    });
    if (!accepted) return reply.code(409).send({ ok: false, error: "token_already_decided" });
    return { ok: true };
  });

  async function resolveByVerdict(token: string, verdict: Verdict) {
    const r = store.resolveVerdict(token, verdict);
    if (r.status === "expired") return { status: 410, body: { ok: false, error: "expired_or_used" } };
    if (r.status === "already_decided") {
      return { status: 200, body: { ok: true, verdict: r.verdict, alreadyResolved: true, reason: "expired_or_used" } };
    }
    // The recorded verdict is what the poller sees, so the keystroke follows it.
    const text = r.verdict === "allow" ? dispatchCfg.approveText : dispatchCfg.denyText;
    const d = await deliver(r.action, text);
    return {
      status: 200,
      body: { ok: true, verdict: r.verdict, sent: text, delivered: d.outcome === "ok", dispatch: d.outcome },
    };
  }

  app.get<TokenParams>("/approve/:token", async (req, reply) => {
    const r = await resolveByVerdict(req.params.token, "allow");
    return reply.code(r.status).send(r.body);
  });

  app.get<TokenParams>("/deny/:token", async (req, reply) => {
    const r = await resolveByVerdict(req.params.token, "deny");
    return reply.code(r.status).send(r.body);
  });

  app.get<TokenParams>("/control/:token", async (req, reply) => {
    const action = store.peekAction(req.params.token);
    if (!action) return reply.code(410).type("text/html; charset=utf-8").send(renderExpiredPage());
    const session = store.getSession(action.sessionId);
    const page = renderControlPage(template, {
      token: action.token,
      createdAt: action.createdAt,
      kind: action.kind,
      project: action.project || (session?.cwd ? path.basename(session.cwd) : ""),
      message: action.message,
      tool: action.tool,
    });
    return reply.type("text/html; charset=utf-8").send(page);
  });

  app.post<TokenParams>("/control/:token", async (req, reply) => {
    const text = (typeof req.body === "string" ? req.body : field(req.body, "text")).trim();
    if (!text) return reply.code(400).send({ ok: false, error: "empty_input" });
    const r = store.resolveText(req.params.token);
    if (r.status === "expired") return reply.code(410).send({ ok: false, error: "expired_or_used" });
    const d = await deliver(r.action, text);
    return { ok: true, sent: text, delivered: d.outcome === "ok", dispatch: d.outcome };
  });

  app.get<TokenParams>("/decision/:token", async (req) => {
    return { ok: true, decision: store.decisionFor(req.params.token) };
  });

  app.get("/health", async () => {
    return { ok: true, uptime: process.uptime() };
  });

  return app;
}
