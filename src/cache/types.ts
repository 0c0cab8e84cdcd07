export type CacheArg = string | number | boolean;

export interface CacheEntry<T> {
  value: T;
  /** Epoch milliseconds of the write. */
  storedAt: number;
  /**
   * Original argument tuple, kept to make the backing file readable. Numbers
   * JSON cannot carry are recorded as text.
   */
  args: CacheArg[];
}

/**
 * Whole content of one namespace, keyed by digest.
 */
export type CacheSnapshot = Record<string, CacheEntry<unknown>>;

export interface CacheStats {
  totalEntries: number;
  /** Bytes held by the durable backing. */
  storageSize: number;
  expiredEntries: number;
}

export interface NamespaceStats extends CacheStats {
  namespace: string;
}

export interface AggregateStats {
  namespaces: NamespaceStats[];
  totals: CacheStats;
}

/**
 * Durable backing of a single namespace. Reads and writes are whole-value.
 */
export interface CacheStorage {
  readonly location: string;
  /**
   * Parsed content of the backing, or `undefined` when nothing has been written.
   * Throws `StorageUnavailableError` when the backing exists but cannot be read
   * or parsed; the shape is checked by the caller.
   */
  read(): unknown;
  write(snapshot: CacheSnapshot): void;
  remove(): void;
  size(): number;
}

export interface ResultCacheOptions {
  maxAgeMs: number;
  storage: CacheStorage;
}

export interface NamespaceConfig {
  maxAgeDays: number;
}

export interface CacheConfig {
  enabled: boolean;
  directory: string;
  namespaces: Record<string, NamespaceConfig>;
}
