import { ItermDispatcher } from "./iterm.js";
import { TmuxDispatcher } from "./tmux.js";
import type { DispatchBackend, DispatchResult, KeystrokeDispatcher } from "./types.js";

export type { DispatchBackend, DispatchOutcome, DispatchResult, KeystrokeDispatcher } from "./types.js";

class DisabledDispatcher implements KeystrokeDispatcher {
  readonly backend = "none" as const;

  async send(): Promise<DispatchResult> {
    return { outcome: "failed", error: "dispatch disabled" };
  }
}

export function createDispatcher(backend: DispatchBackend, timeoutMs?: number): KeystrokeDispatcher {
  if (backend === "iterm") return new ItermDispatcher({ timeoutMs });
  if (backend === "tmux") return new TmuxDispatcher({ timeoutMs });
  return new DisabledDispatcher();
}

/** Terminal handle of the current process for the given backend, or "" when unknown. */
export function detectTerminalHandle(backend: DispatchBackend, env: NodeJS.ProcessEnv = process.env): string {
  if (backend === "iterm") return String(env.ITERM_SESSION_ID ?? "").trim();
  if (backend === "tmux") return String(env.TMUX_PANE ?? "").trim();
  return "";
}
