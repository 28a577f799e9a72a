// Result caching
import { createHash } from "node:crypto";
import { Mutex } from "async-mutex";
import { cacheEvictionsCounter, cacheHitsCounter, cacheMissesCounter, cacheSizeGauge } from "../config/metrics";
import { CacheCorruption } from "../utils/errors";
import { logger } from "../utils/logger";

type Entry<T> = { value: T; createdAt: number; exp: number };

export type CacheLookup<T> = { hit: true; value: T; ageMs: number } | { hit: false };

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
}

export interface CacheSetOptions {
  /** Lifetime of this entry; defaults to the cache's TTL. */
  ttlMs?: number;
  /** A write is skipped once this signal has aborted. */
  signal?: AbortSignal;
}

/**
 * TTL + LRU cache. `store` holds entries and `lru` keeps keys in recency order
 * (oldest first); both always hold the same keys. All access is serialized.
 */
export class TTLCache<T> {
  private store = new Map<string, Entry<T>>();
  private lru = new Set<string>();
  private readonly mutex = new Mutex();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(
    private name: string,
    private ttlMs = 60_000,
    private max = 500,
    private clock: () => number = Date.now
  ) {
    if (ttlMs <= 0 || max <= 0) {
      throw new RangeError(`Cache "${name}" needs a positive TTL and capacity`);
    }
  }

  async get(key: string): Promise<CacheLookup<T>> {
    return await this.mutex.runExclusive((): CacheLookup<T> => {
      try {
        this.assertConsistent();
      } catch (err) {
        if (!(err instanceof CacheCorruption)) throw err;
        logger.error({ cache: this.name, err: err.message }, "cache corrupted, resetting");
        this.reset();
      }

      const e = this.store.get(key);
      const now = this.clock();
      if (!e || now >= e.exp) {
        if (e) {
          this.store.delete(key);
          this.lru.delete(key);
        }
        this.misses++;
        cacheMissesCounter.labels(this.name).inc();
        this.updateSize();
        return { hit: false };
      }
      this.lru.delete(key);
      this.lru.add(key);
      this.hits++;
      cacheHitsCounter.labels(this.name).inc();
      return { hit: true, value: e.value, ageMs: now - e.createdAt };
    });
  }

  /** Returns false when the write was skipped. */
  async set(key: string, val: T, options: CacheSetOptions = {}): Promise<boolean> {
    const ttlMs = options.ttlMs ?? this.ttlMs;
    if (ttlMs <= 0) throw new RangeError(`Cache "${this.name}" needs a positive TTL`);
    return await this.mutex.runExclusive((): boolean => {
      if (options.signal?.aborted) return false;
      if (!this.store.has(key) && this.store.size >= this.max) {
        const oldestKey = this.lru.values().next().value;
        if (oldestKey !== undefined) {
          this.store.delete(oldestKey);
          this.lru.delete(oldestKey);
          this.evictions++;
          cacheEvictionsCounter.labels(this.name).inc();
        }
      }
      const now = this.clock();
      this.store.set(key, { value: val, createdAt: now, exp: now + ttlMs });
      this.lru.delete(key);
      this.lru.add(key);
      this.updateSize();
      return true;
    });
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(() => this.reset());
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, evictions: this.evictions, size: this.store.size };
  }

  /** Keys from least to most recently used. */
  keys(): string[] {
    return [...this.lru];
  }

  private assertConsistent() {
    if (this.store.size !== this.lru.size) {
      throw new CacheCorruption(`store has ${this.store.size} entries but recency list has ${this.lru.size}`);
    }
  }

  private reset() {
    this.store.clear();
    this.lru.clear();
    this.updateSize();
  }

  private updateSize() {
    cacheSizeGauge.labels(this.name).set(this.store.size);
  }
}

export function normalize(s: string) {
  return s.toLowerCase().replace(/\s+/g, " ").trim();
}

export interface CacheKeyParts {
  connectionId: string;
  query: string;
  page: number;
  pageSize: number;
}

/** Same connection, same normalized question and same page give the same key. */
export function buildCacheKey(parts: CacheKeyParts): string {
  return createHash("sha256")
    .update(JSON.stringify([parts.connectionId, normalize(parts.query), parts.page, parts.pageSize]))
    .digest("hex");
}
