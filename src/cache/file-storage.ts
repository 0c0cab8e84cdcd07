import * as fs from 'node:fs';
import * as path from 'node:path';
import { StorageUnavailableError } from './errors';
import type { CacheSnapshot, CacheStorage } from './types';

export interface JsonFileStorageOptions {
  directory: string;
  namespace: string;
  /**
   * Produce human-readable JSON (2-space indent) when true.
   */
  pretty?: boolean;
}

const sanitize = (value: string): string => value.replace(/[^a-zA-Z0-9._-]+/g, '_');

/**
 * One `<namespace>.json` file per namespace, rewritten whole on every write.
 */
export class JsonFileStorage implements CacheStorage {
  readonly location: string;
  private readonly directory: string;
  private readonly pretty: boolean;

  constructor(options: JsonFileStorageOptions) {
    this.directory = options.directory;
    this.location = path.join(options.directory, `${sanitize(options.namespace)}.json`);
    this.pretty = options.pretty ?? true;
  }

  read(): unknown {
    if (!fs.existsSync(this.location)) {
      return undefined;
    }

    let raw: string;
    try {
      raw = fs.readFileSync(this.location, 'utf8');
    } catch (error) {
      throw new StorageUnavailableError(this.location, 'read', error);
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new StorageUnavailableError(this.location, 'read', error);
    }
  }

  write(snapshot: CacheSnapshot): void {
    try {
      fs.mkdirSync(this.directory, { recursive: true });
      fs.writeFileSync(
        this.location,
        JSON.stringify(snapshot, null, this.pretty ? 2 : undefined),
        'utf8'
      );
    } catch (error) {
      throw new StorageUnavailableError(this.location, 'write', error);
    }
  }

  remove(): void {
    try {
      fs.rmSync(this.location, { force: true });
    } catch (error) {
      throw new StorageUnavailableError(this.location, 'remove', error);
    }
  }

  size(): number {
    try {
      return fs.statSync(this.location).size;
    } catch {
      // Missing file means nothing is stored yet
      return 0;
    }
  }
}
