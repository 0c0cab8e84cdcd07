import { StorageUnavailableError } from '../errors';
import { MemoryCacheStorage } from '../memory-storage';
import type { CacheSnapshot } from '../types';

const snapshot: CacheSnapshot = {
  abc: { value: { form: 'je suis' }, storedAt: 1000, args: ['être', 'all'] },
};

describe('MemoryCacheStorage', () => {
  it('should read undefined before anything is written', () => {
    const storage = new MemoryCacheStorage();

    expect(storage.read()).toBeUndefined();
    expect(storage.size()).toBe(0);
    expect(storage.location).toBe('memory');
  });

  it('should return a copy of what was written', () => {
    const storage = new MemoryCacheStorage();
    storage.write(snapshot);

    const read = storage.read();
    expect(read).toEqual(snapshot);
    expect(read).not.toBe(snapshot);
  });

  it('should report the byte size of the serialized snapshot', () => {
    const storage = new MemoryCacheStorage();
    storage.write(snapshot);

    expect(storage.size()).toBe(Buffer.byteLength(JSON.stringify(snapshot), 'utf8'));
  });

  it('should forget everything on remove', () => {
    const storage = new MemoryCacheStorage();
    storage.write(snapshot);
    storage.remove();

    expect(storage.read()).toBeUndefined();
    expect(storage.size()).toBe(0);
  });

  it('should fail to read seeded text that is not JSON', () => {
    const storage = new MemoryCacheStorage('memory:test');
    storage.seed('{not json');

    expect(() => storage.read()).toThrow(StorageUnavailableError);
    expect(() => storage.read()).toThrow('Cache storage memory:test could not be read');
  });
});
