import path from "node:path";

/** Fields this project reads from the agent's hook JSON (stdin). */
export type HookPayload = {
  sessionId: string;
  cwd: string;
  hookEventName: string;
  notificationType: string;
  message: string;
  title: string;
  toolName: string;
  toolInput: Record<string, unknown>;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function str(obj: Record<string, unknown>, key: string): string {
  const v = obj[key];
  return typeof v === "string" ? v : "";
}

export function parseHookPayload(raw: string): HookPayload | null {
  if (!raw.trim()) return null;
  let j: unknown;
  try {
    j = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(j)) return null;
  const toolInput = j.tool_input;
  return {
    sessionId: str(j, "session_id"),
    cwd: str(j, "cwd"),
    hookEventName: str(j, "hook_event_name"),
    notificationType: str(j, "notification_type"),
    message: str(j, "message"),
    title: str(j, "title"),
    toolName: str(j, "tool_name"),
    toolInput: isRecord(toolInput) ? toolInput : {},
  };
}

export function projectName(cwd: string, env: NodeJS.ProcessEnv = process.env): string {
  const dir = cwd || String(env.CLAUDE_PROJECT_DIR ?? "");
  return dir ? path.basename(dir) : "";
}
