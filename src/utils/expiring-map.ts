/**
 * Expiring Map
 *
 * String-keyed map whose entries disappear once their deadline passes.
 * Expired entries are dropped lazily on read and eagerly by `sweep()`,
 * which the registries call from an unref'd interval.
 */

/** Millisecond wall clock, injectable for tests */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

interface ExpiringEntry<V> {
  value: V;
  expiresAt: number;
}

export class ExpiringMap<V> {
  private entries = new Map<string, ExpiringEntry<V>>();

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Insert or replace an entry that lives until `expiresAt` (epoch ms)
   */
  set(key: string, value: V, expiresAt: number): void {
    this.entries.set(key, { value, expiresAt });
  }

  /**
   * Insert only if no live entry exists.
   *
   * The check and the write happen without yielding, so concurrent callers
   * on the event loop observe exactly one winner.
   *
   * @returns true if this call inserted the entry
   */
  setIfAbsent(key: string, value: V, expiresAt: number): boolean {
    if (this.get(key) !== undefined) {
      return false;
    }
    this.entries.set(key, { value, expiresAt });
    return true;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Remove every expired entry
   *
   * @returns number of entries removed
   */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Entry count including expired entries not yet swept */
  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Start a background sweep that does not keep the process alive
 */
export function startSweeper(target: { sweep(): number }, intervalMs: number): NodeJS.Timeout {
  const timer = setInterval(() => {
    target.sweep();
  }, intervalMs);
  timer.unref();
  return timer;
}
