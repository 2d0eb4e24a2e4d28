import { execCapture, type ExecFn } from "./exec.js";
import type { DispatchResult, KeystrokeDispatcher } from "./types.js";

const NOT_FOUND = "session_not_found";

export function appleScriptString(s: string): string {
  return `"${s.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function buildWriteTextScript(sessionId: string, text: string): string {
  return `
tell application "iTerm2"
  repeat with w in windows
    repeat with t in tabs of w
      repeat with s in sessions of t
        if unique ID of s is ${appleScriptString(sessionId)} then
          tell s to write text ${appleScriptString(text)}
          return "sent"
        end if
      end repeat
    end repeat
  end repeat
  return "${NOT_FOUND}"
end tell
`;
}

// ITERM_SESSION_ID looks like "w0t1p0:6B1C..."; AppleScript only knows the part after the colon.
export function itermUniqueId(envValue: string): string {
  const v = envValue.trim();
  const i = v.indexOf(":");
  return i >= 0 ? v.slice(i + 1) : v;
}

export class ItermDispatcher implements KeystrokeDispatcher {
  readonly backend = "iterm" as const;
  private exec: ExecFn;
  private timeoutMs: number;

  constructor(opts?: { exec?: ExecFn; timeoutMs?: number }) {
    this.exec = opts?.exec ?? execCapture;
    this.timeoutMs = opts?.timeoutMs ?? 10_000;
  }

  async send(terminalHandle: string, text: string): Promise<DispatchResult> {
    const script = buildWriteTextScript(itermUniqueId(terminalHandle), text);
    const r = await this.exec("osascript", ["-e", script], { timeoutMs: this.timeoutMs });
    if (!r.ok) {
      return { outcome: "failed", error: r.error ?? (r.stderr.trim() || `osascript exited with ${r.code}`) };
    }
    if (r.stdout.trim() === NOT_FOUND) return { outcome: "session_not_found" };
    return { outcome: "ok" };
  }
}
