import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { DecisionKind } from "./store/action_store.js";
import { decisionKindWire } from "./store/action_store.js";

export type KindDisplay = { icon: string; title: string };

export const KIND_DISPLAY: Record<DecisionKind, KindDisplay> = {
  permission: { icon: "\u{1F512}", title: "Permission Required" },
  idle: { icon: "⌛", title: "Agent is Idle" },
  elicitation: { icon: "❓", title: "Agent has a Question" },
  completion: { icon: "✅", title: "Task Complete" },
  unspecified: { icon: "\u{1F514}", title: "Agent Notification" },
};

export type ControlPageView = {
  token: string;
  createdAt: number;
  kind: DecisionKind;
  project: string;
  message: string;
  tool: string;
};

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function kindLabel(kind: DecisionKind): string {
  return (decisionKindWire(kind) || "notification").replace(/_/g, " ");
}

// Works from both server/src (tsx, vitest) and dist/server/src (built).
function templateCandidates(): string[] {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return [
    path.resolve(here, "..", "pages", "control.html"),
    path.resolve(here, "..", "..", "..", "server", "pages", "control.html"),
  ];
}

export function loadControlTemplate(explicitPath?: string): string {
  const candidates = explicitPath ? [explicitPath] : templateCandidates();
  for (const p of candidates) {
    if (fs.existsSync(p)) return fs.readFileSync(p, "utf8");
  }
  throw new Error(`control page template not found (looked in ${candidates.join(", ")})`);
}

export function renderControlPage(template: string, view: ControlPageView): string {
  const display = KIND_DISPLAY[view.kind];
  const values: Record<string, string> = {
    TOKEN: escapeHtml(view.token),
    CREATED_AT: String(view.createdAt),
    ICON: display.icon,
    TITLE: escapeHtml(display.title),
    PROJECT: escapeHtml(view.project),
    EVENT_TYPE: escapeHtml(kindLabel(view.kind)),
    MESSAGE: escapeHtml(view.message),
    TOOL: escapeHtml(view.tool),
  };
  // Single pass so substituted values are never rescanned for placeholders.
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (m, key: string) => values[key] ?? m);
}

export function renderExpiredPage(): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Expired</title>
  <style>
    body { font-family: -apple-system, system-ui, sans-serif; background: #0d1117; color: #8b949e;
           display: flex; justify-content: center; align-items: center; height: 100vh; margin: 0; }
    .msg { text-align: center; }
    .msg .icon { font-size: 48px; margin-bottom: 16px; }
    .msg h1 { color: #e6edf3; font-size: 20px; margin-bottom: 8px; }
  </style>
</head>
<body>
  <div class="msg">
    <div class="icon">⏰</div>
    <h1>Link Expired</h1>
    <p>This action link has expired or was already used.</p>
  </div>
</body>
</html>`;
}
