/**
 * TTL and capacity bounded in-memory cache.
 *
 * Entries expire after their TTL and are removed lazily when encountered.
 * When a new key arrives at capacity, expired entries are purged first and
 * then the least-recently-inserted entry is evicted. Reads do not promote
 * entries, so eviction follows insertion order rather than recency of use.
 *
 * All operations are synchronous and perform no I/O, which makes each one
 * atomic with respect to other callers on the event loop.
 *
 * @module cache
 */

import { ConfigurationError } from '../errors/index.js';
import { systemClock, type Clock } from '../types/index.js';

/**
 * A single cached value.
 */
export interface CacheEntry<V> {
  readonly key: string;
  readonly value: V;
  /** Epoch milliseconds */
  readonly createdAt: number;
  /** Epoch milliseconds; the entry is never returned once `now >= expiresAt` */
  readonly expiresAt: number;
  readonly version?: number;
}

/**
 * Cache configuration.
 */
export interface SecretCacheConfig {
  /** Default TTL in seconds; 0 turns the cache into a pass-through */
  defaultTTL: number;
  /** Maximum number of entries */
  maxSize: number;
  /** Time source, `Date.now()` by default */
  clock?: Clock;
}

/**
 * Cache statistics snapshot.
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  maxSize: number;
  evictions: number;
}

function assertTTL(ttl: number): void {
  if (!Number.isFinite(ttl) || ttl < 0) {
    throw new ConfigurationError(`Cache TTL must be a non-negative number of seconds, got ${ttl}`);
  }
}

/**
 * TTL cache keyed by string.
 *
 * @example
 * ```typescript
 * const cache = new SecretCache<string>({ defaultTTL: 300, maxSize: 1000 });
 * cache.put('kv:secret:app/db', 'value');
 * cache.get('kv:secret:app/db'); // 'value'
 * ```
 */
export class SecretCache<V> {
  private readonly entries: Map<string, CacheEntry<V>> = new Map();
  private readonly maxSize: number;
  private readonly clock: Clock;
  private defaultTTL: number;
  private sweepTimer?: NodeJS.Timeout;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  /**
   * @throws {ConfigurationError} If the TTL is negative or the capacity is not a positive integer
   */
  constructor(config: SecretCacheConfig) {
    if (!Number.isInteger(config.maxSize) || config.maxSize < 1) {
      throw new ConfigurationError(`Cache capacity must be a positive integer, got ${config.maxSize}`);
    }
    assertTTL(config.defaultTTL);

    this.maxSize = config.maxSize;
    this.defaultTTL = config.defaultTTL;
    this.clock = config.clock ?? systemClock;
  }

  /**
   * Returns the cached value when present and unexpired.
   */
  get(key: string): V | undefined {
    const entry = this.lookup(key);
    if (entry === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    return entry.value;
  }

  /**
   * Returns the whole entry without touching the hit/miss counters.
   */
  peek(key: string): CacheEntry<V> | undefined {
    return this.lookup(key);
  }

  /**
   * Inserts or replaces a value.
   *
   * A replacement counts as a fresh insertion for eviction order. With an
   * effective TTL of 0 nothing is stored and any previous value is dropped.
   *
   * @param ttl - TTL in seconds, defaults to the cache default
   */
  put(key: string, value: V, ttl: number = this.defaultTTL, version?: number): void {
    assertTTL(ttl);
    const isNew = !this.entries.delete(key);
    if (ttl === 0 || this.defaultTTL === 0) {
      return;
    }

    const now = this.clock.now();

    if (isNew && this.entries.size >= this.maxSize) {
      this.purgeExpired();
      if (this.entries.size >= this.maxSize) {
        this.evictOldest();
      }
    }

    this.entries.set(key, {
      key,
      value,
      createdAt: now,
      expiresAt: now + ttl * 1000,
      ...(version !== undefined ? { version } : {}),
    });
  }

  /**
   * Removes a key.
   *
   * @returns true if the key was present
   */
  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Removes every key matching the predicate.
   *
   * @returns Number of removed entries
   */
  invalidateWhere(predicate: (key: string) => boolean): number {
    let removed = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (predicate(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Removes all entries. Counters survive unless `resetStats` is set.
   */
  clear(resetStats: boolean = false): void {
    this.entries.clear();
    if (resetStats) {
      this.hits = 0;
      this.misses = 0;
      this.evictions = 0;
    }
  }

  /**
   * Removes every expired entry.
   *
   * @returns Number of removed entries
   */
  purgeExpired(): number {
    const now = this.clock.now();
    let removed = 0;
    for (const [key, entry] of Array.from(this.entries)) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Starts a periodic purge of expired entries. Only reclaims memory; reads
   * never depend on it.
   */
  startSweep(intervalMs: number): void {
    this.stopSweep();
    this.sweepTimer = setInterval(() => this.purgeExpired(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  /**
   * Changes the default TTL for subsequent insertions.
   *
   * @throws {ConfigurationError} If the TTL is negative
   */
  setDefaultTTL(ttl: number): void {
    assertTTL(ttl);
    this.defaultTTL = ttl;
  }

  getDefaultTTL(): number {
    return this.defaultTTL;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      maxSize: this.maxSize,
      evictions: this.evictions,
    };
  }

  get size(): number {
    return this.entries.size;
  }

  private lookup(key: string): CacheEntry<V> | undefined {
    if (this.defaultTTL === 0) {
      return undefined;
    }

    const entry = this.entries.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this.clock.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry;
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }
}
