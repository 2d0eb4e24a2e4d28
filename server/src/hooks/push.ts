import type { Config } from "../config.js";
import type { FetchFn } from "./client.js";

export type PushAction = { label: string; url: string; clear?: boolean };

export type PushMessage = {
  title: string;
  body: string;
  priority: string;
  tags: string;
  click?: string;
  actions?: PushAction[];
};

export type PushRequest = { url: string; headers: Record<string, string>; body: string };

export const PUSH_TIMEOUT_MS = 5_000;

// Header values must be latin1; ntfy decodes RFC 2047 encoded words.
export function headerValue(s: string): string {
  return /^[\x20-\x7e]*$/.test(s) ? s : `=?UTF-8?B?${Buffer.from(s, "utf8").toString("base64")}?=`;
}

export function formatActions(actions: PushAction[]): string {
  return actions.map((a) => `view, ${a.label}, ${a.url}${a.clear ? ", clear=true" : ""}`).join("; ");
}

/** Builds the ntfy publish request, or null when no topic is configured. */
export function buildPushRequest(push: Config["push"], msg: PushMessage): PushRequest | null {
  const topic = push.topic.trim();
  if (!topic) return null;
  const headers: Record<string, string> = {
    Title: headerValue(msg.title),
    Priority: msg.priority,
    Tags: msg.tags,
  };
  if (msg.click) headers.Click = msg.click;
  if (msg.actions?.length) headers.Actions = headerValue(formatActions(msg.actions));
  return { url: `${push.server.replace(/\/+$/, "")}/${encodeURIComponent(topic)}`, headers, body: msg.body };
}

export async function sendPush(push: Config["push"], msg: PushMessage, fetchFn: FetchFn = fetch): Promise<boolean> {
  const req = buildPushRequest(push, msg);
  if (!req) return false;
  const ac = new AbortController();
  const t = setTimeout(() => ac.abort(), PUSH_TIMEOUT_MS);
  try {
    const r = await fetchFn(req.url, { method: "POST", headers: req.headers, body: req.body, signal: ac.signal });
    if (!r.ok) console.error(`[remote-gate] push rejected: HTTP ${r.status}`);
    return r.ok;
  } catch (e) {
    console.error(`[remote-gate] push failed: ${e instanceof Error ? e.message : String(e)}`);
    return false;
  } finally {
    clearTimeout(t);
  }
}
