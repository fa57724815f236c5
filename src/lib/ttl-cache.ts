/**
 * Explicit TTL cache value object.
 *
 * Each instance is owned by the service that computes the values; there is
 * no process-wide cache. An entry is replaced as a whole on refresh, so
 * concurrent readers see either the old or the new value, never a mix.
 */

interface CacheEntry<T> {
  value: T;
  /** Epoch ms when the value was computed */
  storedAtMs: number;
}

export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAtMs >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, storedAtMs: this.now() });
  }

  /**
   * Return the cached value, or compute, store and return a fresh one.
   * A rejected computation stores nothing.
   */
  async getOrCompute(key: string, compute: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;
    const value = await compute();
    this.set(key, value);
    return value;
  }

  invalidate(): void {
    this.entries.clear();
  }
}
