export type SessionRecord = {
  sessionId: string;
  // Opaque id of the terminal pane that hosts the agent (iTerm unique id, tmux pane).
  terminalHandle: string;
  cwd: string;
  registeredAt: number;
};

export type SessionInput = {
  sessionId: string;
  terminalHandle?: string;
  cwd?: string;
};

export const SESSION_RETENTION_MS = 24 * 60 * 60 * 1000;

export class SessionRegistry {
  private records = new Map<string, SessionRecord>();
  private retentionMs: number;

  constructor(retentionMs = SESSION_RETENTION_MS) {
    this.retentionMs = retentionMs;
  }

  register(input: SessionInput, now: number): SessionRecord {
    const rec: SessionRecord = {
      sessionId: input.sessionId,
      terminalHandle: input.terminalHandle ?? "",
      cwd: input.cwd ?? "",
      registeredAt: now,
    };
    this.records.set(rec.sessionId, rec);
    return rec;
  }

  get(sessionId: string): SessionRecord | null {
    return this.records.get(sessionId) ?? null;
  }

  remove(sessionId: string): boolean {
    return this.records.delete(sessionId);
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [id, rec] of this.records) {
      if (now - rec.registeredAt > this.retentionMs) {
        this.records.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.records.size;
  }
}
