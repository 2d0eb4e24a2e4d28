import { ACTION_TTL_MS } from "./action_store.js";

export type Verdict = "allow" | "deny";

export function parseVerdict(raw: unknown): Verdict | null {
  return raw === "allow" || raw === "deny" ? raw : null;
}

type DecisionEntry = { verdict: Verdict; decidedAt: number };

// Verdicts outlive the action they resolve so a poller that arrives after a
// click still sees the outcome.
export class DecisionChannel {
  private entries = new Map<string, DecisionEntry>();
  private ttlMs: number;

  constructor(ttlMs = ACTION_TTL_MS) {
    this.ttlMs = ttlMs;
  }

  /** Write-once: the first verdict recorded for a token wins and is returned. */
  set(token: string, verdict: Verdict, now: number): Verdict {
    const existing = this.get(token, now);
    if (existing) return existing;
    this.entries.set(token, { verdict, decidedAt: now });
    return verdict;
  }

  get(token: string, now: number): Verdict | null {
    const e = this.entries.get(token);
    if (!e) return null;
    if (now - e.decidedAt > this.ttlMs) {
      this.entries.delete(token);
      return null;
    }
    return e.verdict;
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [token, e] of this.entries) {
      if (now - e.decidedAt > this.ttlMs) {
        this.entries.delete(token);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
