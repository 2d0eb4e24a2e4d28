export type DecisionKind = "permission" | "idle" | "elicitation" | "completion" | "unspecified";

export type ActionRecord = {
  token: string;
  sessionId: string;
  kind: DecisionKind;
  message: string;
  project: string;
  tool: string;
  createdAt: number;
  consumed: boolean;
};

export type ActionInput = {
  token: string;
  sessionId: string;
  kind: DecisionKind;
  message?: string;
  project?: string;
  tool?: string;
};

export const ACTION_TTL_MS = 30 * 60 * 1000;

const WIRE_KINDS: Record<string, DecisionKind> = {
  permission_prompt: "permission",
  idle_prompt: "idle",
  elicitation_dialog: "elicitation",
  stop: "completion",
};

const KIND_WIRE: Record<DecisionKind, string> = {
  permission: "permission_prompt",
  idle: "idle_prompt",
  elicitation: "elicitation_dialog",
  completion: "stop",
  unspecified: "",
};

/** Maps the agent's notification_type values onto a decision kind. */
export function parseDecisionKind(raw: unknown): DecisionKind {
  const s = typeof raw === "string" ? raw.trim().toLowerCase() : "";
  return WIRE_KINDS[s] ?? "unspecified";
}

export function decisionKindWire(kind: DecisionKind): string {
  return KIND_WIRE[kind];
}

/**
 * One-time action tokens. A record goes pending -> consumed exactly once and is
 * never re-armed; expired records disappear on the next read or sweep.
 *
 * Every method is synchronous. The control-plane runs on a single event loop,
 * so `consume` cannot interleave with another `consume` for the same token.
 */
export class ActionStore {
  private records = new Map<string, ActionRecord>();
  private ttlMs: number;

  constructor(ttlMs = ACTION_TTL_MS) {
    this.ttlMs = ttlMs;
  }

  create(input: ActionInput, now: number): void {
    this.records.set(input.token, {
      token: input.token,
      sessionId: input.sessionId,
      kind: input.kind,
      message: input.message ?? "",
      project: input.project ?? "",
      tool: input.tool ?? "",
      createdAt: now,
      consumed: false,
    });
  }

  peek(token: string, now: number): Readonly<ActionRecord> | null {
    const rec = this.records.get(token);
    if (!rec || rec.consumed) return null;
    if (now - rec.createdAt > this.ttlMs) {
      this.records.delete(token);
      return null;
    }
    return { ...rec };
  }

  consume(token: string, now: number): Readonly<ActionRecord> | null {
    if (!this.peek(token, now)) return null;
    const rec = this.records.get(token);
    if (!rec) return null;
    rec.consumed = true;
    return { ...rec };
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [token, rec] of this.records) {
      if (rec.consumed || now - rec.createdAt > this.ttlMs) {
        this.records.delete(token);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.records.size;
  }
}
