import type { FastifyInstance } from "fastify";
import { buildApp } from "../src/app.js";
import type { DispatchResult, KeystrokeDispatcher } from "../src/dispatch/index.js";
import type { FetchFn } from "../src/hooks/client.js";
import { ControlStore } from "../src/store/control_store.js";

export class RecordingDispatcher implements KeystrokeDispatcher {
  readonly backend = "tmux" as const;
  calls: Array<{ handle: string; text: string }> = [];
  private respond: () => Promise<DispatchResult>;

  constructor(respond: () => Promise<DispatchResult> = async () => ({ outcome: "ok" })) {
    this.respond = respond;
  }

  async send(handle: string, text: string): Promise<DispatchResult> {
    this.calls.push({ handle, text });
    return await this.respond();
  }
}

export type Clock = { now: number };

export async function testApp(opts?: { dispatcher?: RecordingDispatcher; clock?: Clock }) {
  const clock = opts?.clock ?? { now: 1_000_000 };
  const store = new ControlStore({ now: () => clock.now });
  const dispatcher = opts?.dispatcher ?? new RecordingDispatcher();
  const app = await buildApp({ store, dispatcher, sweep: false });
  await app.ready();
  return { app, store, dispatcher, clock };
}

function injectMethod(m: string | undefined): "GET" | "POST" | "DELETE" | "OPTIONS" {
  const up = (m ?? "GET").toUpperCase();
  if (up === "POST" || up === "DELETE" || up === "OPTIONS") return up;
  return "GET";
}

/** A fetch that routes to the in-process app, so hook clients need no socket. */
export function injectFetch(app: FastifyInstance, onRequest?: (url: URL) => void): FetchFn {
  return async (url, init) => {
    const u = new URL(url);
    onRequest?.(u);
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((v, k) => {
      headers[k] = v;
    });
    const res = await app.inject({
      method: injectMethod(init?.method),
      url: u.pathname + u.search,
      headers,
      payload: typeof init?.body === "string" ? init.body : undefined,
    });
    const contentType = res.headers["content-type"];
    return new Response(res.statusCode === 204 ? null : res.body, {
      status: res.statusCode,
      headers: typeof contentType === "string" ? { "content-type": contentType } : {},
    });
  };
}

export type CapturedPush = { url: string; headers: Record<string, string>; body: string };

/** Fake push sink that records every publish. */
export function pushRecorder(): { fetch: FetchFn; sent: CapturedPush[] } {
  const sent: CapturedPush[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((v, k) => {
      headers[k] = v;
    });
    sent.push({ url, headers, body: typeof init?.body === "string" ? init.body : "" });
    return new Response("{}", { status: 200 });
  };
  return { fetch: fetchFn, sent };
}
