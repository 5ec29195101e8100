// src/conversation/case-lock.cache.ts

interface Entry {
  caseId: string;
  expiresAt: number;
}

/**
 * Session id -> last locked case id. Advisory only: read when the durable
 * store cannot be reached, never trusted over it. Least recently used entries
 * are evicted first; entries expire after `ttlMs`.
 */
export class CaseLockCache {
  private readonly entries = new Map<string, Entry>();

  constructor(
    private readonly maxEntries: number,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(sessionId: string): string | null {
    const entry = this.entries.get(sessionId);
    if (!entry) return null;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(sessionId);
      return null;
    }

    // refresh recency
    this.entries.delete(sessionId);
    this.entries.set(sessionId, entry);
    return entry.caseId;
  }

  set(sessionId: string, caseId: string): void {
    this.entries.delete(sessionId);
    this.entries.set(sessionId, { caseId, expiresAt: this.now() + this.ttlMs });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  delete(sessionId: string): void {
    this.entries.delete(sessionId);
  }

  get size(): number {
    return this.entries.size;
  }
}
