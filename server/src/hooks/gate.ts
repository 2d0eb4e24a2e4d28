import { setTimeout as sleepMs } from "node:timers/promises";
import { nanoid } from "nanoid";
import { publicBaseUrl, type Config } from "../config.js";
import type { Verdict } from "../store/decision_channel.js";
import { truncate } from "../text.js";
import type { ControlClient, FetchFn } from "./client.js";
import { describeToolRequest } from "./describe.js";
import { projectName, type HookPayload } from "./payload.js";
import { sendPush } from "./push.js";

export type WaitOptions = {
  timeoutMs: number;
  intervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

// Consecutive failed queries after which the control-plane is treated as gone.
export const MAX_UNREACHABLE = 3;

/**
 * Polls the decision endpoint until a verdict appears or the deadline passes.
 * Returns null on timeout; the caller then falls back to its local default.
 */
export async function waitForDecision(client: ControlClient, token: string, opts: WaitOptions): Promise<Verdict | null> {
  const now = opts.now ?? Date.now;
  const sleep = opts.sleep ?? ((ms: number) => sleepMs(ms));
  const deadline = now() + opts.timeoutMs;
  let failures = 0;
  while (now() < deadline) {
    const d = await client.decision(token);
    if (d === "unreachable") {
      failures += 1;
      if (failures >= MAX_UNREACHABLE) return null;
    } else if (d) {
      return d;
    } else {
      failures = 0;
    }
    await sleep(Math.min(opts.intervalMs, Math.max(0, deadline - now())));
  }
  return null;
}

export type PermissionDecision = { behavior: "allow" } | { behavior: "deny"; message: string };

export type PermissionHookOutput = {
  hookSpecificOutput: { hookEventName: "PermissionRequest"; decision: PermissionDecision };
};

export const DENY_MESSAGE = "Denied via remote-gate";

export function permissionOutput(verdict: Verdict): PermissionHookOutput {
  const decision: PermissionDecision = verdict === "allow" ? { behavior: "allow" } : { behavior: "deny", message: DENY_MESSAGE };
  return { hookSpecificOutput: { hookEventName: "PermissionRequest", decision } };
}

export type GateDeps = {
  config: Config;
  client: ControlClient;
  fetch?: FetchFn;
  newToken?: () => string;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export const GATE_MESSAGE_CHARS = 300;

/**
 * PermissionRequest hook: announce the request on the phone, then block until
 * the operator answers or the gate times out.
 */
export async function runPermissionGate(p: HookPayload, deps: GateDeps): Promise<PermissionHookOutput | null> {
  const { config, client } = deps;
  const tool = p.toolName || "Unknown";
  const message = truncate(describeToolRequest(tool, p.toolInput), GATE_MESSAGE_CHARS);
  const project = projectName(p.cwd);
  const title = project ? `[${project}] Allow ${tool}?` : `Allow ${tool}?`;

  let token = "";
  if (await client.health()) {
    const candidate = (deps.newToken ?? (() => nanoid(24)))();
    const registered = await client.registerAction({
      token: candidate,
      sessionId: p.sessionId,
      notificationType: "permission_prompt",
      message,
      project,
      tool,
    });
    if (registered) token = candidate;
  }

  const base = publicBaseUrl(config);
  const pushed = sendPush(
    config.push,
    {
      title,
      body: message,
      priority: config.push.priorityPermission,
      tags: "lock",
      click: token ? `${base}/control/${token}` : undefined,
      actions: token
        ? [
            { label: "Allow", url: `${base}/approve/${token}`, clear: true },
            { label: "Deny", url: `${base}/deny/${token}`, clear: true },
            { label: "Details", url: `${base}/control/${token}` },
          ]
        : [],
    },
    deps.fetch,
  );

  const verdict = token
    ? await waitForDecision(client, token, {
        timeoutMs: config.gate.timeoutMs,
        intervalMs: config.gate.intervalMs,
        now: deps.now,
        sleep: deps.sleep,
      })
    : null;
  await pushed;
  return verdict ? permissionOutput(verdict) : null;
}
