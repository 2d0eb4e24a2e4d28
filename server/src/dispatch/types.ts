export type DispatchOutcome = "ok" | "session_not_found" | "failed";

export type DispatchResult = {
  outcome: DispatchOutcome;
  error?: string;
};

export type DispatchBackend = "iterm" | "tmux" | "none";

/**
 * Types text into a specific terminal session. Implementations must resolve,
 * never reject; the control-plane treats delivery as best-effort.
 */
export interface KeystrokeDispatcher {
  readonly backend: DispatchBackend;
  send(terminalHandle: string, text: string): Promise<DispatchResult>;
}
