import { z } from 'zod';
import * as logger from '../logging';
import { StorageUnavailableError } from './errors';
import { buildCacheKey, storableArg } from './key';
import type {
  CacheArg,
  CacheEntry,
  CacheSnapshot,
  CacheStats,
  CacheStorage,
  ResultCacheOptions,
} from './types';

const CacheEntrySchema = z.object({
  value: z.unknown(),
  storedAt: z.number().finite(),
  args: z.array(z.union([z.string(), z.number(), z.boolean()])),
});

const SnapshotSchema = z.record(z.string(), z.unknown());

function isValidMaxAge(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Persistent key/value cache for one namespace.
 *
 * Every mutation is written through to the storage immediately. Storage failures
 * are logged and the in-memory state stays authoritative for the rest of the
 * process; a backing that cannot be read or parsed opens as an empty cache.
 */
export class ResultCache {
  readonly namespace: string;
  readonly maxAgeMs: number;
  private readonly storage: CacheStorage;
  private readonly entries: Map<string, CacheEntry<unknown>>;

  private constructor(
    namespace: string,
    options: ResultCacheOptions,
    entries: Map<string, CacheEntry<unknown>>
  ) {
    if (!isValidMaxAge(options.maxAgeMs)) {
      throw new RangeError(`Invalid maxAge for cache '${namespace}': ${options.maxAgeMs}`);
    }
    this.namespace = namespace;
    this.maxAgeMs = options.maxAgeMs;
    this.storage = options.storage;
    this.entries = entries;
  }

  static open(namespace: string, options: ResultCacheOptions): ResultCache {
    return new ResultCache(namespace, options, loadEntries(namespace, options.storage));
  }

  get location(): string {
    return this.storage.location;
  }

  /**
   * Stored value for the argument tuple, or `undefined` on a miss. An expired
   * entry is dropped and persisted before reporting the miss.
   */
  get(...args: CacheArg[]): unknown {
    const key = buildCacheKey(this.namespace, args);
    const entry = this.entries.get(key);
    if (!entry) {
      logger.debug(`Cache miss in '${this.namespace}' for ${formatArgs(args)}`);
      return undefined;
    }

    if (this.isExpired(entry, Date.now())) {
      logger.debug(`Cache entry in '${this.namespace}' for ${formatArgs(args)} expired`);
      this.entries.delete(key);
      this.persist();
      return undefined;
    }

    logger.debug(`Cache hit in '${this.namespace}' for ${formatArgs(args)}`);
    return entry.value;
  }

  /**
   * Store `value` under the argument tuple. `undefined` cannot be represented in
   * the backing and is ignored.
   */
  set(value: unknown, ...args: CacheArg[]): void {
    if (value === undefined) {
      logger.debug(`Refusing to cache undefined in '${this.namespace}' for ${formatArgs(args)}`);
      return;
    }

    const key = buildCacheKey(this.namespace, args);
    this.entries.set(key, { value, storedAt: Date.now(), args: args.map(storableArg) });
    this.persist();
  }

  clear(): void {
    this.entries.clear();
    try {
      this.storage.remove();
    } catch (error) {
      this.reportStorageError(error);
    }
  }

  cleanupExpired(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed += 1;
      }
    }

    if (removed > 0) {
      this.persist();
    }

    return removed;
  }

  stats(): CacheStats {
    if (this.entries.size === 0) {
      return { totalEntries: 0, storageSize: 0, expiredEntries: 0 };
    }

    const now = Date.now();
    let expiredEntries = 0;
    for (const entry of this.entries.values()) {
      if (this.isExpired(entry, now)) {
        expiredEntries += 1;
      }
    }

    return {
      totalEntries: this.entries.size,
      storageSize: this.storage.size(),
      expiredEntries,
    };
  }

  private isExpired(entry: CacheEntry<unknown>, now: number): boolean {
    return now - entry.storedAt > this.maxAgeMs;
  }

  private persist(): void {
    const snapshot: CacheSnapshot = Object.fromEntries(this.entries);
    try {
      this.storage.write(snapshot);
    } catch (error) {
      this.reportStorageError(error);
    }
  }

  private reportStorageError(error: unknown): void {
    if (error instanceof StorageUnavailableError) {
      logger.warning(`Could not save cache '${this.namespace}': ${error.message}`);
      return;
    }
    throw error;
  }
}

function loadEntries(namespace: string, storage: CacheStorage): Map<string, CacheEntry<unknown>> {
  const entries = new Map<string, CacheEntry<unknown>>();

  let raw: unknown;
  try {
    raw = storage.read();
  } catch (error) {
    if (error instanceof StorageUnavailableError) {
      logger.warning(`Starting cache '${namespace}' empty: ${error.message}`);
      return entries;
    }
    throw error;
  }

  if (raw === undefined) {
    return entries;
  }

  const snapshot = SnapshotSchema.safeParse(raw);
  if (!snapshot.success) {
    logger.warning(`Starting cache '${namespace}' empty: ${storage.location} is not a cache file`);
    return entries;
  }

  let dropped = 0;
  for (const [key, candidate] of Object.entries(snapshot.data)) {
    const parsed = CacheEntrySchema.safeParse(candidate);
    if (!parsed.success || parsed.data.value === undefined) {
      dropped += 1;
      continue;
    }
    entries.set(key, {
      value: parsed.data.value,
      storedAt: parsed.data.storedAt,
      args: parsed.data.args,
    });
  }

  if (dropped > 0) {
    logger.warning(`Ignored ${dropped} unreadable entr${dropped === 1 ? 'y' : 'ies'} in cache '${namespace}'`);
  }

  return entries;
}

function formatArgs(args: readonly CacheArg[]): string {
  return `(${args.map((arg) => JSON.stringify(arg)).join(', ')})`;
}
