/**
 * Dedup Cache - fingerprint-keyed cache of validated documents.
 *
 * Completed results live in an LRU bounded by entry count and byte budget.
 * Computations in progress are tracked separately by a SingleFlight, outside
 * the LRU, so a key can never be evicted while it is being computed.
 */

import { LRUCache } from "lru-cache";
import { SingleFlight } from "./single-flight.js";

export interface DedupCacheOptions<V> {
  maxEntries: number;
  /** Byte budget across all entries; requires sizeOf */
  maxBytes?: number;
  sizeOf?: (value: V) => number;
}

export interface DedupCacheStats {
  size: number;
  bytes: number;
  inFlight: number;
  hits: number;
  misses: number;
  joined: number;
  evictions: number;
}

export class DedupCache<V extends {}> {
  private readonly entries: LRUCache<string, V>;
  private readonly flight = new SingleFlight<string, V>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: DedupCacheOptions<V>) {
    const sizeOf = options.sizeOf;
    const budget = options.maxBytes !== undefined && sizeOf
      ? { maxSize: options.maxBytes, sizeCalculation: (value: V) => Math.max(1, sizeOf(value)) }
      : {};

    this.entries = new LRUCache<string, V>({
      max: options.maxEntries,
      ...budget,
      dispose: (_value, _key, reason) => {
        if (reason === "evict") this.evictions++;
      },
    });
  }

  /**
   * Return the cached value for `key`, or compute it once.
   * Concurrent callers for a missing key share a single `compute` call.
   * A failed computation is not cached; the next caller computes again.
   */
  async getOrCompute(key: string, compute: () => Promise<V> | V): Promise<V> {
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    if (!this.flight.has(key)) {
      this.misses++;
    }

    return this.flight.run(key, async () => {
      const value = await compute();
      this.entries.set(key, value);
      return value;
    });
  }

  peek(key: string): V | undefined {
    return this.entries.peek(key);
  }

  isInFlight(key: string): boolean {
    return this.flight.has(key);
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): DedupCacheStats {
    return {
      size: this.entries.size,
      bytes: this.entries.calculatedSize,
      inFlight: this.flight.size,
      hits: this.hits,
      misses: this.misses,
      joined: this.flight.joined,
      evictions: this.evictions,
    };
  }
}
