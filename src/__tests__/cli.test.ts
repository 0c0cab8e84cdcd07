import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';
import { MemoryCacheStorage } from '../cache';
import { type CommandDeps, aliasesCommand, buildProgram, cacheCommand, queryCommand } from '../cli';
import { resetLogger } from '../logging';
import { FakeProvider, mangerPayload } from '../test/test-helpers';

const BUNDLED_DATA = path.resolve(__dirname, '..', '..', 'data', 'verbs');

describe('CLI', () => {
  let tempDir: string;
  let storages: Map<string, MemoryCacheStorage>;
  let provider: FakeProvider;
  let deps: CommandDeps;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let originalLevel: typeof chalk.level;

  const printed = (spy: jest.SpyInstance): unknown[] => spy.mock.calls.map((call) => call[0]);

  beforeEach(() => {
    originalLevel = chalk.level;
    chalk.level = 0;
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cj-cli-'));
    storages = new Map();
    provider = new FakeProvider({ manger: mangerPayload() });
    deps = {
      cwd: tempDir,
      env: {},
      appOptions: {
        provider,
        decorateProvider: (inner) => inner,
        storageFactory: (namespace) => {
          const existing = storages.get(namespace);
          if (existing) {
            return existing;
          }
          const created = new MemoryCacheStorage(`memory:${namespace}`);
          storages.set(namespace, created);
          return created;
        },
      },
    };

    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    resetLogger();
    chalk.level = originalLevel;
    process.exitCode = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('queryCommand', () => {
    it('should print a single form and succeed', async () => {
      const code = await queryCommand(
        { kind: 'form', verb: 'manger', person: 'tu', tense: 'p' },
        {},
        deps
      );

      expect(code).toBe(0);
      expect(printed(logSpy)).toEqual(['tu + présent: tu manges']);
    });

    it('should print the outcome as JSON and keep logs off stdout', async () => {
      const code = await queryCommand(
        { kind: 'impersonal', verb: 'manger', tense: 'pp' },
        { json: true, verbose: true },
        deps
      );

      expect(code).toBe(0);
      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
        status: 'form',
        verb: 'manger',
        tense: 'participe passé',
        form: 'mangé',
        shape: 'impersonal',
      });
    });

    it('should print failures as JSON with a failing exit code', async () => {
      const code = await queryCommand({ kind: 'all', verb: 'voler' }, { json: true }, deps);

      expect(code).toBe(1);
      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toMatchObject({
        status: 'provider-failure',
        reason: 'unknown-verb',
      });
    });

    it('should explain an unknown tense and point to the aliases', async () => {
      const code = await queryCommand(
        { kind: 'form', verb: 'manger', person: 'je', tense: 'aorist' },
        {},
        deps
      );

      expect(code).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith("❌ Unknown tense: 'aorist' (see 'cj aliases')");
      expect(logSpy).toHaveBeenCalledWith("ℹ️  Use 'cj aliases' to see available tense aliases");
      expect(provider.calls).toEqual([]);
    });

    it('should answer from the bundled verb tables', async () => {
      const code = await queryCommand(
        { kind: 'form', verb: 'être', person: 'nous', tense: 'fut' },
        {},
        {
          cwd: tempDir,
          env: { CJ_DATA_DIR: BUNDLED_DATA },
          appOptions: {
            decorateProvider: (inner) => inner,
            storageFactory: () => new MemoryCacheStorage(),
          },
        }
      );

      expect(code).toBe(0);
      expect(printed(logSpy)).toEqual(['nous + futur simple: nous serons']);
    });

    it('should report configuration errors with their issues', async () => {
      const configFile = path.join(tempDir, 'cj.config.yml');
      fs.writeFileSync(configFile, 'version: 1\ncache:\n  enabled: "yes"\n');

      const code = await queryCommand({ kind: 'all', verb: 'manger' }, {}, deps);

      expect(code).toBe(1);
      expect(printed(errorSpy)).toEqual([
        `❌ Configuration validation failed for ${configFile}`,
        '❌   • cache.enabled: Expected boolean, but received string\n' +
          '    → Turns the persistent result cache on or off',
      ]);
    });

    it('should print configuration warnings', async () => {
      fs.writeFileSync(path.join(tempDir, 'cj.config.yml'), 'version: 1\ncache:\n  enabled: false\n');

      await queryCommand({ kind: 'all', verb: 'manger' }, {}, deps);

      expect(warnSpy).toHaveBeenCalledWith(
        '⚠️  Caching is disabled, every query will consult the conjugation provider'
      );
    });
  });

  describe('aliasesCommand', () => {
    it('should list every tense as JSON', () => {
      expect(aliasesCommand({ json: true }, deps)).toBe(0);

      const parsed: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(Array.isArray(parsed) && parsed.length).toBe(20);
    });
  });

  describe('cacheCommand', () => {
    it('should say when nothing is cached', () => {
      expect(cacheCommand('stats', {}, deps)).toBe(0);

      expect(logSpy).toHaveBeenCalledWith('No cached data found');
    });

    it('should count cached queries in the statistics', async () => {
      await queryCommand({ kind: 'all', verb: 'manger' }, { quiet: true }, deps);
      logSpy.mockClear();

      expect(cacheCommand('stats', { json: true }, deps)).toBe(0);

      const stats: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(stats).toMatchObject({
        totals: { totalEntries: 1, expiredEntries: 0 },
      });
    });

    it('should report statistics for one namespace', async () => {
      await queryCommand({ kind: 'all', verb: 'manger' }, { quiet: true }, deps);
      logSpy.mockClear();

      expect(cacheCommand('stats', { json: true, namespace: 'conjugation' }, deps)).toBe(0);

      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toMatchObject({
        namespace: 'conjugation',
        totalEntries: 1,
      });
    });

    it('should clear caches that held entries', async () => {
      await queryCommand({ kind: 'all', verb: 'manger' }, { quiet: true }, deps);
      logSpy.mockClear();

      expect(cacheCommand('clear', {}, deps)).toBe(0);
      expect(cacheCommand('clear', {}, deps)).toBe(0);

      expect(printed(logSpy)).toEqual(['✅ Cleared 1 cache(s)', 'ℹ️  No caches to clear']);
    });

    it('should report expired entries removed as JSON', () => {
      expect(cacheCommand('cleanup', { json: true }, deps)).toBe(0);

      expect(printed(logSpy)).toEqual(['{\n  "removed": 0\n}']);
    });

    it('should reject an unknown namespace', () => {
      expect(cacheCommand('clear', { namespace: 'nope' }, deps)).toBe(1);

      expect(errorSpy).toHaveBeenCalledWith(
        "❌ Unknown cache 'nope'. Known caches: conjugation, wordreference, larousse"
      );
    });
  });

  describe('buildProgram', () => {
    it('should run a command and set the exit code', async () => {
      await buildProgram(deps).parseAsync(['node', 'cj', 'form', 'tu', 'manger', 'p']);

      expect(process.exitCode).toBe(0);
      expect(printed(logSpy)).toEqual(['tu + présent: tu manges']);
    });

    it('should accept global options after the command', async () => {
      await buildProgram(deps).parseAsync(['node', 'cj', 'person', 'vous', 'manger', '--json']);

      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toMatchObject({
        status: 'person-forms',
        person: 'vous',
      });
    });

    it('should fail when a query has no answer', async () => {
      await buildProgram(deps).parseAsync(['node', 'cj', 'person', 'they', 'manger']);

      expect(process.exitCode).toBe(1);
    });

    it('should refuse --verbose together with --quiet', async () => {
      const program = buildProgram(deps)
        .exitOverride()
        .configureOutput({ writeErr: () => undefined });

      await expect(program.parseAsync(['node', 'cj', '-v', '-q', 'aliases'])).rejects.toThrow(
        '--verbose and --quiet cannot be used together'
      );
    });

    it('should reject an unknown cache action', async () => {
      const program = buildProgram(deps);
      program.commands.forEach((command) => {
        command.exitOverride().configureOutput({ writeErr: () => undefined });
      });

      await expect(program.parseAsync(['node', 'cj', 'cache', 'purge'])).rejects.toThrow(
        /purge/
      );
    });
  });
});
