export { StorageUnavailableError } from './errors';
export type { StorageOperation } from './errors';
export { JsonFileStorage } from './file-storage';
export type { JsonFileStorageOptions } from './file-storage';
export { buildCacheKey } from './key';
export { MemoryCacheStorage } from './memory-storage';
export { CacheRegistry, DEFAULT_MAX_AGE_DAYS, daysToMs } from './registry';
export type { CacheRegistryOptions } from './registry';
export { ResultCache } from './result-cache';
export type {
  AggregateStats,
  CacheArg,
  CacheConfig,
  CacheEntry,
  CacheSnapshot,
  CacheStats,
  CacheStorage,
  NamespaceConfig,
  NamespaceStats,
  ResultCacheOptions,
} from './types';
