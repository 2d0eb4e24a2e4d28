import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { nanoid } from "nanoid";
import * as TOML from "@iarna/toml";
import type { DispatchBackend } from "./dispatch/types.js";

export type Config = {
  server: {
    bind: string;
    port: number;
    // Base URL the phone uses to reach this server (tunnel / VPN). Empty means local URL.
    publicUrl: string;
  };
  retention: {
    actionTtlMs: number;
    sessionRetentionMs: number;
    sweepIntervalMs: number;
  };
  gate: {
    timeoutMs: number;
    intervalMs: number;
  };
  dispatch: {
    backend: DispatchBackend;
    timeoutMs: number;
    approveText: string;
    denyText: string;
  };
  push: {
    server: string;
    topic: string;
    priorityPermission: string;
    priorityIdle: string;
    priorityDone: string;
  };
};

export const DEFAULT_PORT = 9876;

export function configDir(): string {
  const override = String(process.env.RG_CONFIG_DIR ?? "").trim();
  return override || path.join(os.homedir(), ".remote-gate");
}

export function configPath(dir = configDir()): string {
  return path.join(dir, "config.toml");
}

export function newPushTopic(): string {
  return `remote-gate-${nanoid(16)}`;
}

export function defaultConfig(): Config {
  return {
    // Loopback only: remote reachability comes from a tunnel or VPN, this server has no auth.
    server: { bind: "127.0.0.1", port: DEFAULT_PORT, publicUrl: "" },
    retention: {
      actionTtlMs: 30 * 60 * 1000,
      sessionRetentionMs: 24 * 60 * 60 * 1000,
      sweepIntervalMs: 5 * 60 * 1000,
    },
    gate: { timeoutMs: 60_000, intervalMs: 2_000 },
    dispatch: { backend: process.platform === "darwin" ? "iterm" : "tmux", timeoutMs: 10_000, approveText: "y", denyText: "n" },
    push: {
      server: "https://ntfy.sh",
      topic: newPushTopic(),
      priorityPermission: "high",
      priorityIdle: "high",
      priorityDone: "default",
    },
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = root[key];
  return isRecord(v) ? v : {};
}

function str(obj: Record<string, unknown>, key: string, fallback: string): string {
  const v = obj[key];
  return typeof v === "string" ? v.trim() : fallback;
}

function positiveInt(obj: Record<string, unknown>, key: string, fallback: number): number {
  const v = obj[key];
  const n = typeof v === "number" ? v : typeof v === "string" ? Number(v) : NaN;
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
}

function port(v: number, fallback: number): number {
  return v > 0 && v < 65536 ? v : fallback;
}

function backend(v: string, fallback: DispatchBackend): DispatchBackend {
  return v === "iterm" || v === "tmux" || v === "none" ? v : fallback;
}

/**
 * Parses config.toml; unknown keys are ignored and bad values fall back to defaults.
 * A missing `push.topic` parses as "" (no push); `loadOrCreateConfig` fills it in once.
 */
export function parseConfigToml(raw: string, defaults = defaultConfig()): Config {
  const root: Record<string, unknown> = TOML.parse(raw);
  const server = section(root, "server");
  const retention = section(root, "retention");
  const gate = section(root, "gate");
  const dispatch = section(root, "dispatch");
  const push = section(root, "push");
  const d = defaults;

  return {
    server: {
      bind: str(server, "bind", d.server.bind) || d.server.bind,
      port: port(positiveInt(server, "port", d.server.port), d.server.port),
      publicUrl: str(server, "publicUrl", d.server.publicUrl),
    },
    retention: {
      actionTtlMs: positiveInt(retention, "actionTtlMs", d.retention.actionTtlMs),
      sessionRetentionMs: positiveInt(retention, "sessionRetentionMs", d.retention.sessionRetentionMs),
      sweepIntervalMs: positiveInt(retention, "sweepIntervalMs", d.retention.sweepIntervalMs),
    },
    gate: {
      timeoutMs: positiveInt(gate, "timeoutMs", d.gate.timeoutMs),
      intervalMs: positiveInt(gate, "intervalMs", d.gate.intervalMs),
    },
    dispatch: {
      backend: backend(str(dispatch, "backend", d.dispatch.backend), d.dispatch.backend),
      timeoutMs: positiveInt(dispatch, "timeoutMs", d.dispatch.timeoutMs),
      approveText: str(dispatch, "approveText", d.dispatch.approveText) || d.dispatch.approveText,
      denyText: str(dispatch, "denyText", d.dispatch.denyText) || d.dispatch.denyText,
    },
    push: {
      server: str(push, "server", d.push.server) || d.push.server,
      topic: str(push, "topic", ""),
      priorityPermission: str(push, "priorityPermission", d.push.priorityPermission) || d.push.priorityPermission,
      priorityIdle: str(push, "priorityIdle", d.push.priorityIdle) || d.push.priorityIdle,
      priorityDone: str(push, "priorityDone", d.push.priorityDone) || d.push.priorityDone,
    },
  };
}

export function stringifyConfigToml(cfg: Config): string {
  return TOML.stringify(cfg);
}

/** Runtime-only overrides; never written back to config.toml. */
export function applyEnvOverrides(cfg: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const out = structuredClone(cfg);

  const bind = String(env.RG_BIND ?? "").trim();
  if (bind) out.server.bind = bind;

  const portRaw = String(env.RG_PORT ?? "").trim();
  if (portRaw) {
    const n = Number(portRaw);
    if (Number.isFinite(n) && n > 0 && n < 65536) out.server.port = Math.floor(n);
  }

  const publicUrl = String(env.RG_PUBLIC_URL ?? "").trim();
  if (publicUrl) out.server.publicUrl = publicUrl;

  const topic = String(env.RG_TOPIC ?? "").trim();
  if (topic) out.push.topic = topic;

  const gateRaw = String(env.RG_GATE_TIMEOUT_MS ?? "").trim();
  if (gateRaw) {
    const n = Number(gateRaw);
    if (Number.isFinite(n) && n > 0) out.gate.timeoutMs = Math.floor(n);
  }

  return out;
}

// An explicit `topic = ""` turns push off and is kept as is.
function hasPushTopic(raw: string): boolean {
  return typeof section(TOML.parse(raw), "push").topic === "string";
}

export function loadOrCreateConfig(dir = configDir()): Config {
  const p = configPath(dir);
  let cfg: Config;
  if (!fs.existsSync(p)) {
    fs.mkdirSync(dir, { recursive: true });
    cfg = defaultConfig();
    fs.writeFileSync(p, stringifyConfigToml(cfg), "utf8");
  } else {
    const raw = fs.readFileSync(p, "utf8");
    cfg = parseConfigToml(raw);
    if (!hasPushTopic(raw)) {
      cfg.push.topic = newPushTopic();
      fs.writeFileSync(p, stringifyConfigToml(cfg), "utf8");
    }
  }
  return applyEnvOverrides(cfg);
}

/** URL the control-plane is reachable at from this machine. */
export function localBaseUrl(cfg: Config): string {
  const b = cfg.server.bind;
  const host = b === "0.0.0.0" || b === "::" ? "127.0.0.1" : b.includes(":") && !b.startsWith("[") ? `[${b}]` : b;
  return `http://${host}:${cfg.server.port}`;
}

/** URL embedded in push notifications; the public tunnel URL when configured. */
export function publicBaseUrl(cfg: Config): string {
  return (cfg.server.publicUrl || localBaseUrl(cfg)).replace(/\/+$/, "");
}
