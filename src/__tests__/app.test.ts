import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { CONJUGATION_NAMESPACE, createApp } from '../app';
import { MemoryCacheStorage } from '../cache';
import { defaultConfig } from '../config';
import { defaultTaxonomy } from '../grammar';
import { resetLogger, setLogger } from '../logging';
import type { ConjugationProvider } from '../provider';
import { FakeProvider, createMockLogger, mangerPayload } from '../test/test-helpers';

describe('createApp', () => {
  let tempDir: string;

  beforeEach(() => {
    setLogger(createMockLogger());
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cj-app-'));
  });

  afterEach(() => {
    resetLogger();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should wire the service to the conjugation cache', async () => {
    const storage = new MemoryCacheStorage();
    const provider = new FakeProvider({ manger: mangerPayload() });
    const app = createApp(defaultConfig().config, {
      provider,
      storageFactory: () => storage,
    });

    await app.service.query({ kind: 'all', verb: 'manger' });

    expect(CONJUGATION_NAMESPACE).toBe('conjugation');
    expect(app.registry.open(CONJUGATION_NAMESPACE).stats().totalEntries).toBe(1);
    expect(app.warnings).toEqual([]);
  });

  it('should apply the provider decorator', async () => {
    const provider = new FakeProvider({ manger: mangerPayload() });
    const decorate = jest.fn((inner: ConjugationProvider) => inner);

    createApp(defaultConfig().config, {
      provider,
      decorateProvider: decorate,
      storageFactory: () => new MemoryCacheStorage(),
    });

    expect(decorate).toHaveBeenCalledWith(provider);
  });

  it('should load a custom taxonomy and surface its overlaps', () => {
    const base = defaultTaxonomy();
    const file = path.join(tempDir, 'taxonomy.json');
    fs.writeFileSync(
      file,
      JSON.stringify({
        language: 'fr',
        persons: base.persons,
        tenses: [
          { key: 'présent', mood: 'indicatif', tense: 'présent', aliases: ['présent', 'p'] },
          { key: 'passé composé', mood: 'indicatif', tense: 'passé-composé', aliases: ['p'] },
        ],
      })
    );
    const config = defaultConfig().config;
    config.grammar.taxonomy = file;

    const app = createApp(config, { storageFactory: () => new MemoryCacheStorage() });

    expect(app.resolver.resolveTense('p')).toBe('présent');
    expect(app.warnings).toEqual([
      "tense alias 'p' is declared by both 'présent' and 'passé composé'; 'présent' wins",
    ]);
  });
});
