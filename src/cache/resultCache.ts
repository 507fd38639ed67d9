/**
 * Bounded in-memory cache for the results of cache-enabled tools.
 *
 * Entries expire after their TTL and the least recently used entry is evicted
 * once {@link ResultCacheOptions.maxEntries} is exceeded. Concurrent misses on
 * the same key share one execution. Values are cloned on the way in and out so
 * callers can mutate what they receive without corrupting the cache.
 */

import { raceWithSignal, toAbortError } from "../infra/deadline.js";

export interface ResultCacheOptions {
  /** Maximum number of entries; `0` disables the cache entirely. */
  readonly maxEntries: number;
  /** TTL applied when the caller does not provide one. */
  readonly defaultTtlMs: number;
  readonly clock?: () => number;
}

/** Outcome of {@link ResultCache.remember}. */
export interface CacheLookup<T> {
  readonly value: T;
  /** `true` when the value came from a stored entry or a shared in-flight execution. */
  readonly cached: boolean;
}

/** Counters exposed for diagnostics. */
export interface ResultCacheStats {
  readonly size: number;
  readonly hits: number;
  readonly misses: number;
  readonly evictions: number;
}

/** A caller joining {@link ResultCache.remember} with its own cancellation. */
export interface CacheWaiter {
  readonly signal: AbortSignal;
  /** Receives the shared execution's rejection after this waiter has left. */
  readonly onLateRejection: (error: unknown) => void;
}

interface PendingExecution {
  readonly promise: Promise<unknown>;
  readonly controller: AbortController;
  waiters: number;
  settled: boolean;
}

interface CacheEntry {
  readonly value: unknown;
  readonly expiresAt: number;
}

const MIN_TTL_MS = 1;
const KEY_SEPARATOR = "::";

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly pending = new Map<string, PendingExecution>();
  private readonly maxEntries: number;
  private readonly defaultTtlMs: number;
  private readonly clock: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ResultCacheOptions) {
    this.maxEntries = Math.max(0, Math.floor(options.maxEntries));
    this.defaultTtlMs = Math.max(MIN_TTL_MS, options.defaultTtlMs);
    this.clock = options.clock ?? (() => Date.now());
  }

  public get enabled(): boolean {
    return this.maxEntries > 0;
  }

  public get size(): number {
    return this.entries.size;
  }

  public stats(): ResultCacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses, evictions: this.evictions };
  }

  /** Stored value for {@link key}, or `undefined` when absent or expired. */
  public peek(key: string): unknown {
    const entry = this.readEntry(key, this.clock());
    return entry ? clone(entry.value) : undefined;
  }

  /**
   * Returns the cached value for {@link key} or runs {@link factory} once for
   * every concurrent caller. Rejections are shared with the waiters and never
   * stored.
   *
   * The shared execution receives its own signal. A waiter whose signal fires
   * leaves with that signal's reason while the others keep waiting; the
   * execution is aborted only once every waiter has left.
   */
  public async remember<T>(
    key: string,
    factory: (signal: AbortSignal) => Promise<T>,
    ttlMs?: number,
    waiter?: CacheWaiter,
  ): Promise<CacheLookup<T>> {
    if (!this.enabled) {
      return { value: await factory(waiter?.signal ?? new AbortController().signal), cached: false };
    }

    const entry = this.readEntry(key, this.clock());
    if (entry) {
      this.hits += 1;
      // Entries are only ever written from `factory` results for the same key.
      return { value: clone(entry.value) as T, cached: true };
    }

    let execution = this.pending.get(key);
    const cached = execution !== undefined;
    if (execution) {
      this.hits += 1;
    } else {
      this.misses += 1;
      execution = this.start(key, factory, ttlMs);
    }

    const shared = execution;
    shared.waiters += 1;
    try {
      const value = waiter
        ? await raceWithSignal(shared.promise, waiter.signal, waiter.onLateRejection)
        : await shared.promise;
      // Same invariant as above: the shared promise resolves with `factory` results.
      return { value: clone(value) as T, cached };
    } finally {
      shared.waiters -= 1;
      if (shared.waiters === 0 && !shared.settled) {
        if (this.pending.get(key) === shared) {
          this.pending.delete(key);
        }
        shared.controller.abort(waiter ? toAbortError(waiter.signal) : undefined);
      }
    }
  }

  private start<T>(key: string, factory: (signal: AbortSignal) => Promise<T>, ttlMs: number | undefined): PendingExecution {
    const controller = new AbortController();
    const execution: PendingExecution = {
      controller,
      waiters: 0,
      settled: false,
      promise: new Promise<T>((resolve) => resolve(factory(controller.signal)))
        .then((value) => {
          this.store(key, value, ttlMs);
          return value;
        })
        .finally(() => {
          execution.settled = true;
          if (this.pending.get(key) === execution) {
            this.pending.delete(key);
          }
        }),
    };
    this.pending.set(key, execution);
    return execution;
  }

  public delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Drops every entry produced by {@link tool}. Returns how many went. */
  public invalidateTool(tool: string): number {
    const prefix = `${tool}${KEY_SEPARATOR}`;
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  public clear(): void {
    this.entries.clear();
  }

  private readEntry(key: string, now: number): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    this.entries.delete(key);
    if (now >= entry.expiresAt) {
      return undefined;
    }
    // Re-inserting moves the key to the most recently used position.
    this.entries.set(key, entry);
    return entry;
  }

  private store(key: string, value: unknown, ttlMs: number | undefined): void {
    const ttl = ttlMs !== undefined && Number.isFinite(ttlMs) ? Math.max(MIN_TTL_MS, ttlMs) : this.defaultTtlMs;
    this.entries.delete(key);
    this.entries.set(key, { value: clone(value), expiresAt: this.clock() + ttl });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
      this.evictions += 1;
    }
  }
}

/** Cache key of a call: tool name plus the canonical JSON of its arguments. */
export function buildResultCacheKey(tool: string, args: unknown): string {
  return `${tool}${KEY_SEPARATOR}${JSON.stringify(canonicalise(args, new WeakSet())) ?? "null"}`;
}

/**
 * Recursively sorts object keys so logically equal argument objects produce
 * the same key whatever their property order.
 */
export function canonicalise(value: unknown, seen: WeakSet<object>): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((entry) => canonicalise(entry, seen));
    }
    const normalised: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        normalised[key] = canonicalise(entry, seen);
      }
    }
    return normalised;
  } finally {
    seen.delete(value);
  }
}

function clone<T>(value: T): T {
  try {
    return structuredClone(value);
  } catch {
    // Values that cannot be cloned (functions, class instances with handles) are shared.
    return value;
  }
}
