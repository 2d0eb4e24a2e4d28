import { ACTION_TTL_MS, ActionStore, type ActionInput, type ActionRecord } from "./action_store.js";
import { DecisionChannel, type Verdict } from "./decision_channel.js";
import { SESSION_RETENTION_MS, SessionRegistry, type SessionInput, type SessionRecord } from "./session_registry.js";

export type ControlStoreOptions = {
  actionTtlMs?: number;
  sessionRetentionMs?: number;
  sweepIntervalMs?: number;
  now?: () => number;
};

export type VerdictResolution =
  | { status: "resolved"; action: Readonly<ActionRecord>; verdict: Verdict }
  | { status: "already_decided"; verdict: Verdict }
  | { status: "expired" };

export type TextResolution = { status: "resolved"; action: Readonly<ActionRecord> } | { status: "expired" };

export type SweepReport = { sessions: number; actions: number; decisions: number };

export const SWEEP_INTERVAL_MS = 5 * 60 * 1000;

/**
 * Owns the session registry, the action tokens and the decision channel.
 *
 * Resolution only goes through `resolveVerdict` / `resolveText`, which keeps
 * the single consume point for a token inside this class. `start()` arms the
 * periodic sweep; `stop()` must be called at shutdown.
 */
export class ControlStore {
  private sessions: SessionRegistry;
  private actions: ActionStore;
  private decisions: DecisionChannel;
  private sweepIntervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private now: () => number;

  constructor(opts: ControlStoreOptions = {}) {
    const ttl = opts.actionTtlMs ?? ACTION_TTL_MS;
    this.sessions = new SessionRegistry(opts.sessionRetentionMs ?? SESSION_RETENTION_MS);
    this.actions = new ActionStore(ttl);
    this.decisions = new DecisionChannel(ttl);
    this.sweepIntervalMs = opts.sweepIntervalMs ?? SWEEP_INTERVAL_MS;
    this.now = opts.now ?? (() => Date.now());
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      const r = this.sweep();
      if (r.sessions || r.actions || r.decisions) {
        console.log(
          `[remote-gate] sweep removed ${r.actions} action(s), ${r.decisions} decision(s), ${r.sessions} session(s)`,
        );
      }
    }, this.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  registerSession(input: SessionInput): SessionRecord {
    return this.sessions.register(input, this.now());
  }

  getSession(sessionId: string): SessionRecord | null {
    return this.sessions.get(sessionId);
  }

  removeSession(sessionId: string): void {
    this.sessions.remove(sessionId);
  }

  /** False when the token already carries a verdict; a decided token is never re-armed. */
  registerAction(input: ActionInput): boolean {
    const now = this.now();
    if (this.decisions.get(input.token, now)) return false;
    this.actions.create(input, now);
    return true;
  }

  peekAction(token: string): Readonly<ActionRecord> | null {
    return this.actions.peek(token, this.now());
  }

  decisionFor(token: string): Verdict | null {
    return this.decisions.get(token, this.now());
  }

  resolveVerdict(token: string, verdict: Verdict): VerdictResolution {
    const now = this.now();
    if (!this.actions.peek(token, now)) {
      const prior = this.decisions.get(token, now);
      return prior ? { status: "already_decided", verdict: prior } : { status: "expired" };
    }
    // Record the verdict before consuming so a poller can never observe a
    // consumed action without its verdict.
    const recorded = this.decisions.set(token, verdict, now);
    const action = this.actions.consume(token, now);
    if (!action) return { status: "already_decided", verdict: recorded };
    return { status: "resolved", action, verdict: recorded };
  }

  resolveText(token: string): TextResolution {
    const action = this.actions.consume(token, this.now());
    return action ? { status: "resolved", action } : { status: "expired" };
  }

  sweep(now = this.now()): SweepReport {
    return {
      sessions: this.sessions.sweep(now),
      actions: this.actions.sweep(now),
      decisions: this.decisions.sweep(now),
    };
  }

  stats(): { sessions: number; actions: number; decisions: number } {
    return { sessions: this.sessions.size, actions: this.actions.size, decisions: this.decisions.size };
  }
}
