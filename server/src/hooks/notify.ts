import { nanoid } from "nanoid";
import { publicBaseUrl, type Config } from "../config.js";
import { detectTerminalHandle } from "../dispatch/index.js";
import { itermUniqueId } from "../dispatch/iterm.js";
import { truncate } from "../text.js";
import type { ControlClient, FetchFn } from "./client.js";
import { classifyEvent } from "./describe.js";
import { projectName, type HookPayload } from "./payload.js";
import { sendPush, type PushMessage } from "./push.js";

export const NOTIFY_MESSAGE_CHARS = 200;

export type NotifyDeps = {
  config: Config;
  client: ControlClient;
  fetch?: FetchFn;
  newToken?: () => string;
};

/** Builds the push for a Notification/Stop event; `token` adds the remote-control links. */
export function notificationMessage(p: HookPayload, config: Config, token: string): PushMessage {
  const ev = classifyEvent(p.hookEventName, p.notificationType, p.title, config.push);
  const project = projectName(p.cwd);
  const base = publicBaseUrl(config);
  const msg: PushMessage = {
    title: project ? `[${project}] ${ev.title}` : ev.title,
    body: truncate(p.message || "Your agent needs your attention", NOTIFY_MESSAGE_CHARS),
    priority: ev.priority,
    tags: ev.tags,
  };
  if (token) {
    msg.click = `${base}/control/${token}`;
    msg.actions = [
      { label: "Approve", url: `${base}/approve/${token}`, clear: true },
      { label: "Deny", url: `${base}/deny/${token}`, clear: true },
      { label: "Open", url: `${base}/control/${token}` },
    ];
  }
  return msg;
}

export async function runNotify(p: HookPayload, deps: NotifyDeps): Promise<boolean> {
  const { config, client } = deps;
  let token = "";
  if (await client.health()) {
    const candidate = (deps.newToken ?? (() => nanoid(24)))();
    const registered = await client.registerAction({
      token: candidate,
      sessionId: p.sessionId,
      notificationType: p.notificationType || "stop",
      message: truncate(p.message, NOTIFY_MESSAGE_CHARS),
      project: projectName(p.cwd),
    });
    if (registered) token = candidate;
  }
  return await sendPush(config.push, notificationMessage(p, config, token), deps.fetch);
}

export async function runSessionStart(
  p: HookPayload,
  deps: { config: Config; client: ControlClient; env?: NodeJS.ProcessEnv },
): Promise<boolean> {
  if (!p.sessionId) return false;
  const backend = deps.config.dispatch.backend;
  const raw = detectTerminalHandle(backend, deps.env);
  return await deps.client.registerSession({
    sessionId: p.sessionId,
    terminalHandle: backend === "iterm" ? itermUniqueId(raw) : raw,
    cwd: p.cwd,
  });
}

export async function runSessionEnd(p: HookPayload, client: ControlClient): Promise<boolean> {
  if (!p.sessionId) return false;
  return await client.removeSession(p.sessionId);
}
