/**
 * FIFO queue of users waiting for a room slot.
 * Not synchronized on its own; the matchmaker guards it with a lock.
 */

export interface QueueEntry {
  username: string;
  queuedAt: number;
}

export interface EnqueueResult {
  /** 1-based position. */
  position: number;
  /** True when the user was already queued (nothing changed). */
  alreadyQueued: boolean;
}

export class WaitQueue {
  private entries: QueueEntry[] = [];
  private readonly now: () => number;

  constructor(now: () => number) {
    this.now = now;
  }

  get size(): number {
    return this.entries.length;
  }

  enqueue(username: string): EnqueueResult {
    const existing = this.position(username);
    if (existing > 0) return { position: existing, alreadyQueued: true };
    this.entries.push({ username, queuedAt: this.now() });
    return { position: this.entries.length, alreadyQueued: false };
  }

  /** 1-based position, 0 when not queued. */
  position(username: string): number {
    return this.entries.findIndex((e) => e.username === username) + 1;
  }

  peekFront(): QueueEntry | undefined {
    const front = this.entries[0];
    return front ? { ...front } : undefined;
  }

  dequeueFront(): QueueEntry | undefined {
    return this.entries.shift();
  }

  remove(username: string): boolean {
    const idx = this.entries.findIndex((e) => e.username === username);
    if (idx === -1) return false;
    this.entries.splice(idx, 1);
    return true;
  }

  /** Drops entries queued at least ttlMs ago; the rest keep their order. */
  removeExpired(ttlMs: number): QueueEntry[] {
    const now = this.now();
    const expired: QueueEntry[] = [];
    this.entries = this.entries.filter((entry) => {
      if (now - entry.queuedAt >= ttlMs) {
        expired.push(entry);
        return false;
      }
      return true;
    });
    return expired;
  }
}
