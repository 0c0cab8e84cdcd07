import { StorageUnavailableError } from './errors';
import type { CacheSnapshot, CacheStorage } from './types';

/**
 * In-process backing. Holds a serialized copy so callers never share
 * references with what is "on disk".
 */
export class MemoryCacheStorage implements CacheStorage {
  readonly location: string;
  private serialized: string | undefined;

  constructor(location = 'memory') {
    this.location = location;
  }

  read(): unknown {
    if (this.serialized === undefined) {
      return undefined;
    }
    try {
      return JSON.parse(this.serialized);
    } catch (error) {
      throw new StorageUnavailableError(this.location, 'read', error);
    }
  }

  write(snapshot: CacheSnapshot): void {
    this.serialized = JSON.stringify(snapshot);
  }

  remove(): void {
    this.serialized = undefined;
  }

  size(): number {
    return this.serialized === undefined ? 0 : Buffer.byteLength(this.serialized, 'utf8');
  }

  /** Replace the stored text verbatim, e.g. to simulate a damaged file. */
  seed(raw: string): void {
    this.serialized = raw;
  }
}
