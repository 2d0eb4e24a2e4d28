import { parseVerdict, type Verdict } from "../store/decision_channel.js";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type SessionRegistration = { sessionId: string; terminalHandle: string; cwd: string };

export type ActionRegistration = {
  token: string;
  sessionId: string;
  notificationType: string;
  message: string;
  project: string;
  tool?: string;
};

/**
 * Hook-side client for the control-plane. Never throws: a server that cannot
 * be reached means "no remote control", and callers fall back to local behaviour.
 */
export class ControlClient {
  private baseUrl: string;
  private fetchFn: FetchFn;

  constructor(baseUrl: string, opts?: { fetch?: FetchFn }) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.fetchFn = opts?.fetch ?? fetch;
  }

  private async call(pathname: string, init: RequestInit, timeoutMs: number): Promise<{ status: number; json: unknown } | null> {
    const ac = new AbortController();
    const t = setTimeout(() => ac.abort(), timeoutMs);
    try {
      const r = await this.fetchFn(this.baseUrl + pathname, { ...init, signal: ac.signal });
      const json: unknown = await r.json().catch(() => null);
      return { status: r.status, json };
    } catch {
      return null;
    } finally {
      clearTimeout(t);
    }
  }

  private async postJson(pathname: string, body: Record<string, string>): Promise<boolean> {
    const r = await this.call(
      pathname,
      { method: "POST", headers: { "content-type": "application/json" }, body: JSON.stringify(body) },
      2_000,
    );
    return r?.status === 200;
  }

  async health(): Promise<boolean> {
    const r = await this.call("/health", { method: "GET" }, 1_000);
    return r?.status === 200;
  }

  async registerSession(s: SessionRegistration): Promise<boolean> {
    return await this.postJson("/session", { session_id: s.sessionId, terminal_session: s.terminalHandle, cwd: s.cwd });
  }

  async removeSession(sessionId: string): Promise<boolean> {
    const r = await this.call(`/session/${encodeURIComponent(sessionId)}`, { method: "DELETE" }, 2_000);
    return r?.status === 200;
  }

  async registerAction(a: ActionRegistration): Promise<boolean> {
    return await this.postJson("/register-action", {
      token: a.token,
      session_id: a.sessionId,
      notification_type: a.notificationType,
      message: a.message,
      project: a.project,
      tool: a.tool ?? "",
    });
  }

  /** The recorded verdict, null while undecided, "unreachable" when the query failed. */
  async decision(token: string): Promise<Verdict | null | "unreachable"> {
    const r = await this.call(`/decision/${encodeURIComponent(token)}`, { method: "GET" }, 2_000);
    if (!r || r.status !== 200) return "unreachable";
    const decision: unknown = typeof r.json === "object" && r.json !== null ? Reflect.get(r.json, "decision") : null;
    return parseVerdict(decision);
  }
}
