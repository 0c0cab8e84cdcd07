import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { StorageUnavailableError } from '../errors';
import { JsonFileStorage } from '../file-storage';
import type { CacheSnapshot } from '../types';

const snapshot: CacheSnapshot = {
  abc: { value: ['parle', 'parlons', 'parlez'], storedAt: 42, args: ['parler', 'all'] },
};

describe('JsonFileStorage', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cj-storage-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should place one file per namespace in the directory', () => {
    const storage = new JsonFileStorage({ directory: tempDir, namespace: 'conjugation' });

    expect(storage.location).toBe(path.join(tempDir, 'conjugation.json'));
  });

  it('should sanitize namespace names used as file names', () => {
    const storage = new JsonFileStorage({ directory: tempDir, namespace: 'a/b c' });

    expect(storage.location).toBe(path.join(tempDir, 'a_b_c.json'));
  });

  it('should read undefined and size 0 when no file exists', () => {
    const storage = new JsonFileStorage({ directory: tempDir, namespace: 'conjugation' });

    expect(storage.read()).toBeUndefined();
    expect(storage.size()).toBe(0);
  });

  it('should create missing directories and write pretty JSON', () => {
    const directory = path.join(tempDir, 'nested', 'cache');
    const storage = new JsonFileStorage({ directory, namespace: 'conjugation' });

    storage.write(snapshot);

    const content = fs.readFileSync(path.join(directory, 'conjugation.json'), 'utf8');
    expect(content).toBe(JSON.stringify(snapshot, null, 2));
    expect(storage.read()).toEqual(snapshot);
    expect(storage.size()).toBe(Buffer.byteLength(content, 'utf8'));
  });

  it('should write compact JSON when pretty is false', () => {
    const storage = new JsonFileStorage({
      directory: tempDir,
      namespace: 'conjugation',
      pretty: false,
    });

    storage.write(snapshot);

    expect(fs.readFileSync(storage.location, 'utf8')).toBe(JSON.stringify(snapshot));
  });

  it('should raise StorageUnavailableError for a damaged file', () => {
    const storage = new JsonFileStorage({ directory: tempDir, namespace: 'conjugation' });
    fs.writeFileSync(storage.location, '{"abc": ', 'utf8');

    const error = (() => {
      try {
        storage.read();
        return undefined;
      } catch (caught) {
        return caught;
      }
    })();

    expect(error).toBeInstanceOf(StorageUnavailableError);
    expect(error).toMatchObject({ operation: 'read', location: storage.location });
  });

  it('should raise StorageUnavailableError when the directory cannot be created', () => {
    const blocker = path.join(tempDir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory', 'utf8');
    const storage = new JsonFileStorage({
      directory: path.join(blocker, 'cache'),
      namespace: 'conjugation',
    });

    expect(() => storage.write(snapshot)).toThrow(StorageUnavailableError);
    expect(() => storage.write(snapshot)).toThrow(
      `Cache storage ${storage.location} could not be written`
    );
  });

  it('should remove the file and tolerate removing it twice', () => {
    const storage = new JsonFileStorage({ directory: tempDir, namespace: 'conjugation' });
    storage.write(snapshot);

    storage.remove();
    storage.remove();

    expect(fs.existsSync(storage.location)).toBe(false);
    expect(storage.read()).toBeUndefined();
  });
});
