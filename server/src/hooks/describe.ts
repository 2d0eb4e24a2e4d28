import type { Config } from "../config.js";

function text(input: Record<string, unknown>, key: string): string {
  const v = input[key];
  return typeof v === "string" ? v : "";
}

function asString(v: unknown): string {
  if (typeof v === "string") return v;
  const s = JSON.stringify(v);
  return s === undefined ? String(v) : s;
}

function firstFields(input: Record<string, unknown>): string[] {
  return Object.entries(input)
    .slice(0, 3)
    .map(([k, v]) => `${k}: ${asString(v).slice(0, 60)}`);
}

/** Human-readable summary of what the agent wants to do, shown in the push and on the page. */
export function describeToolRequest(toolName: string, input: Record<string, unknown>): string {
  const tool = toolName || "Unknown";
  switch (tool) {
    case "Bash": {
      const cmd = text(input, "command");
      const desc = text(input, "description");
      return desc ? `${desc}\n\n$ ${cmd}` : `$ ${cmd}`;
    }
    case "Write":
      return `Create/overwrite file:\n${text(input, "file_path") || "unknown"}`;
    case "Edit":
      return `Edit file: ${text(input, "file_path") || "unknown"}\nReplace: ${text(input, "old_string").slice(0, 80)}...`;
    case "WebFetch":
      return `Fetch URL:\n${text(input, "url") || "unknown"}`;
    case "Task":
      return `Launch ${text(input, "subagent_type") || "unknown"} agent: ${text(input, "description")}`;
    default:
      if (tool.startsWith("mcp__")) return `MCP tool: ${tool}\n${firstFields(input).join("\n")}`;
      return `${tool}: ${firstFields(input).join(", ")}`;
  }
}

export type EventClass = {
  title: string;
  priority: string;
  tags: string;
};

export function classifyEvent(
  hookEventName: string,
  notificationType: string,
  fallbackTitle: string,
  push: Config["push"],
): EventClass {
  const title = fallbackTitle || "Agent Notification";
  if (hookEventName === "Stop") return { title: "Task Complete", priority: push.priorityDone, tags: "white_check_mark" };
  if (hookEventName !== "Notification") return { title, priority: "default", tags: "bell" };
  switch (notificationType) {
    case "permission_prompt":
      return { title: "Permission Required", priority: push.priorityPermission, tags: "lock" };
    case "idle_prompt":
      return { title: "Agent is Idle", priority: push.priorityIdle, tags: "hourglass" };
    case "elicitation_dialog":
      return { title: "Agent has a Question", priority: "default", tags: "question" };
    default:
      return { title, priority: "default", tags: "bell" };
  }
}
