import type { Image } from '../image';

/**
 * Cached values carry a tag so a lookup for one kind never hands back the other.
 */
export type CacheEntry = { kind: 'value'; value: unknown } | { kind: 'image'; value: Image };

export interface MemoryCacheConfig {
  /** Upper bound on entries. Least recently used entries are dropped first. Unbounded when omitted. */
  countLimit?: number;
}

/**
 * In-process cache keyed by string, backed by a Map whose insertion order
 * doubles as recency order.
 */
export class MemoryCache {
  private entries = new Map<string, CacheEntry>();
  readonly countLimit?: number;

  constructor(config: MemoryCacheConfig = {}) {
    this.countLimit = config.countLimit;
  }

  get(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (entry) {
      // refresh recency
      this.entries.delete(key);
      this.entries.set(key, entry);
    }
    return entry;
  }

  set(key: string, entry: CacheEntry): void {
    this.entries.delete(key);
    this.entries.set(key, entry);
    this._evict();
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  private _evict(): void {
    if (this.countLimit === undefined) return;
    while (this.entries.size > this.countLimit) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
