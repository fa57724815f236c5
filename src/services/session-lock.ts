/**
 * Per-Session Lock
 *
 * Serializes engine updates for a single test session: one response is
 * recorded, ability is recomputed and the next item is selected before the
 * next update (or an abandon) for the same session may start. Different
 * sessions never wait on each other.
 *
 * Waiters queue in arrival order. The lock is released when the holder's
 * promise settles, whether it resolved or rejected.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LockInfo {
  sessionId: string;
  acquiredAt: string;
  holderInfo: string;
  /** Callers queued behind the current holder */
  waiting: number;
}

interface LockState {
  tail: Promise<void>;
  acquiredAt: number;
  holderInfo: string;
  pending: number;
}

// ---------------------------------------------------------------------------
// Lock
// ---------------------------------------------------------------------------

export class SessionLock {
  private readonly locks = new Map<string, LockState>();

  /**
   * Run `fn` while holding the lock for `sessionId`.
   */
  async run<T>(sessionId: string, holderInfo: string, fn: () => Promise<T>): Promise<T> {
    let state = this.locks.get(sessionId);
    if (!state) {
      state = { tail: Promise.resolve(), acquiredAt: 0, holderInfo: "", pending: 0 };
      this.locks.set(sessionId, state);
    }

    const previous = state.tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    state.tail = previous.then(() => current);
    state.pending++;

    await previous;
    state.acquiredAt = Date.now();
    state.holderInfo = holderInfo;

    try {
      return await fn();
    } finally {
      release();
      state.pending--;
      if (state.pending === 0 && this.locks.get(sessionId) === state) {
        this.locks.delete(sessionId);
      }
    }
  }

  isLocked(sessionId: string): boolean {
    return this.locks.has(sessionId);
  }

  /**
   * Snapshot of currently held locks, for monitoring.
   */
  status(): LockInfo[] {
    return [...this.locks.entries()].map(([sessionId, s]) => ({
      sessionId,
      acquiredAt: new Date(s.acquiredAt).toISOString(),
      holderInfo: s.holderInfo,
      waiting: Math.max(0, s.pending - 1),
    }));
  }
}
