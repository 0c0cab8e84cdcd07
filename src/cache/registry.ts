import * as logger from '../logging';
import { JsonFileStorage } from './file-storage';
import { MemoryCacheStorage } from './memory-storage';
import { ResultCache } from './result-cache';
import type { AggregateStats, CacheConfig, CacheStorage, NamespaceStats } from './types';

export const DEFAULT_MAX_AGE_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

export function daysToMs(days: number): number {
  return days * DAY_MS;
}

export interface CacheRegistryOptions {
  /** Override how a namespace's backing is created (tests use in-memory storage). */
  storageFactory?: (namespace: string) => CacheStorage;
}

/**
 * The set of known namespaces and the bulk operations that fan out over them.
 * Each namespace is opened at most once per registry.
 */
export class CacheRegistry {
  private readonly config: CacheConfig;
  private readonly storageFactory: (namespace: string) => CacheStorage;
  private readonly opened = new Map<string, ResultCache>();

  constructor(config: CacheConfig, options: CacheRegistryOptions = {}) {
    this.config = config;
    this.storageFactory = options.storageFactory ?? ((namespace) => this.createStorage(namespace));
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  namespaces(): string[] {
    return Object.keys(this.config.namespaces);
  }

  has(namespace: string): boolean {
    return Object.hasOwn(this.config.namespaces, namespace);
  }

  open(namespace: string): ResultCache {
    const existing = this.opened.get(namespace);
    if (existing) {
      return existing;
    }

    const maxAgeDays = this.config.namespaces[namespace]?.maxAgeDays;
    if (maxAgeDays === undefined) {
      logger.debug(
        `Cache '${namespace}' is not configured, using the default of ${DEFAULT_MAX_AGE_DAYS} days`
      );
    }

    const cache = ResultCache.open(namespace, {
      maxAgeMs: daysToMs(maxAgeDays ?? DEFAULT_MAX_AGE_DAYS),
      storage: this.storageFactory(namespace),
    });
    this.opened.set(namespace, cache);
    return cache;
  }

  statsAll(): AggregateStats {
    const namespaces: NamespaceStats[] = this.namespaces().map((namespace) => ({
      namespace,
      ...this.open(namespace).stats(),
    }));

    const totals = namespaces.reduce(
      (acc, row) => ({
        totalEntries: acc.totalEntries + row.totalEntries,
        storageSize: acc.storageSize + row.storageSize,
        expiredEntries: acc.expiredEntries + row.expiredEntries,
      }),
      { totalEntries: 0, storageSize: 0, expiredEntries: 0 }
    );

    return { namespaces, totals };
  }

  /**
   * Clear every namespace. Returns how many of them held entries.
   */
  clearAll(): number {
    let cleared = 0;
    for (const namespace of this.namespaces()) {
      const cache = this.open(namespace);
      if (cache.stats().totalEntries > 0) {
        cleared += 1;
      }
      cache.clear();
    }
    return cleared;
  }

  cleanupExpiredAll(): number {
    return this.namespaces().reduce(
      (removed, namespace) => removed + this.open(namespace).cleanupExpired(),
      0
    );
  }

  private createStorage(namespace: string): CacheStorage {
    if (!this.config.enabled) {
      return new MemoryCacheStorage(`memory:${namespace}`);
    }
    return new JsonFileStorage({ directory: this.config.directory, namespace });
  }
}
