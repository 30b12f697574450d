import { emitEvent } from "../pipeline/events.js";

export interface CacheEntry<T> {
  value: T;
  /** Epoch milliseconds at which the value was stored. */
  fetchedAt: number;
}

/**
 * Process-scoped memo keyed by endpoint. A value is fresh for `ttlMs` after it
 * was stored; concurrent loads of the same key share one in-flight promise,
 * and a failed load leaves the previous entry in place.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inflight = new Map<string, Promise<CacheEntry<T>>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  isFresh(entry: CacheEntry<T>): boolean {
    return this.now() - entry.fetchedAt < this.ttlMs;
  }

  /** Fresh entry for `key`, if any. */
  get(key: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(key);
    return entry && this.isFresh(entry) ? entry : undefined;
  }

  /** Latest stored entry for `key`, stale or not. */
  peek(key: string): CacheEntry<T> | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: T): CacheEntry<T> {
    const entry = { value, fetchedAt: this.now() };
    this.entries.set(key, entry);
    emitEvent({
      level: "debug",
      eventType: "cache.store",
      message: "Cache entry stored",
      url: key,
    });
    return entry;
  }

  invalidate(key: string): void {
    this.entries.delete(key);
  }

  async getOrLoad(key: string, load: () => Promise<T>): Promise<CacheEntry<T>> {
    const cached = this.get(key);
    if (cached) {
      emitEvent({
        level: "debug",
        eventType: "cache.hit",
        message: "Serving cached table",
        url: key,
        ageMs: this.now() - cached.fetchedAt,
      });
      return cached;
    }
    return this.load(key, load);
  }

  /** Loads `key` regardless of freshness, joining a load already in flight. */
  load(key: string, load: () => Promise<T>): Promise<CacheEntry<T>> {
    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }

    emitEvent({
      level: "info",
      eventType: "cache.miss",
      message: this.entries.has(key) ? "Cached table is stale; reloading" : "No cached table; loading",
      url: key,
    });

    const promise = load()
      .then((value) => this.set(key, value))
      .finally(() => {
        this.inflight.delete(key);
      });
    this.inflight.set(key, promise);
    return promise;
  }
}
