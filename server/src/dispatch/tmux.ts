import { execCapture, type ExecFn } from "./exec.js";
import type { DispatchResult, KeystrokeDispatcher } from "./types.js";

function isMissingTarget(stderr: string): boolean {
  const s = stderr.toLowerCase();
  return s.includes("can't find") || s.includes("no server running") || s.includes("not found");
}

export class TmuxDispatcher implements KeystrokeDispatcher {
  readonly backend = "tmux" as const;
  private exec: ExecFn;
  private timeoutMs: number;

  constructor(opts?: { exec?: ExecFn; timeoutMs?: number }) {
    this.exec = opts?.exec ?? execCapture;
    this.timeoutMs = opts?.timeoutMs ?? 10_000;
  }

  async send(terminalHandle: string, text: string): Promise<DispatchResult> {
    const pane = terminalHandle.trim();
    // -l sends the text literally; Enter goes separately so it is not typed as a word.
    const typed = await this.exec("tmux", ["send-keys", "-t", pane, "-l", text], { timeoutMs: this.timeoutMs });
    if (!typed.ok) return this.failure(typed.stderr, typed.error, typed.code);
    const entered = await this.exec("tmux", ["send-keys", "-t", pane, "Enter"], { timeoutMs: this.timeoutMs });
    if (!entered.ok) return this.failure(entered.stderr, entered.error, entered.code);
    return { outcome: "ok" };
  }

  private failure(stderr: string, error: string | undefined, code: number | null): DispatchResult {
    if (!error && isMissingTarget(stderr)) return { outcome: "session_not_found" };
    return { outcome: "failed", error: error ?? (stderr.trim() || `tmux exited with ${code}`) };
  }
}
