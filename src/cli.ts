#!/usr/bin/env node

import { Argument, Command } from 'commander';
import { type App, type AppOptions, createApp } from './app';
import { type ConfigEnvironment, ConfigValidationError, loadConfig } from './config';
import type { ConjugationQuery, QueryOutcome } from './conjugator';
import { ConsoleLogger, setLogger } from './logging';
import * as logger from './logging';
import { type ConjugationProvider, SpinnerProvider } from './provider';
import { JsonReporter, TableReporter, describeFailure } from './reporting';

export interface GlobalOptions {
  config?: string | undefined;
  json?: boolean | undefined;
  verbose?: boolean | undefined;
  quiet?: boolean | undefined;
}

export interface CacheOptions extends GlobalOptions {
  namespace?: string | undefined;
}

export const CACHE_ACTIONS = ['stats', 'clear', 'cleanup'] as const;

export type CacheAction = (typeof CACHE_ACTIONS)[number];

/**
 * Seams for tests: where configuration is read from and how the app is wired.
 */
export interface CommandDeps {
  cwd?: string;
  env?: ConfigEnvironment;
  appOptions?: AppOptions;
}

const ANSWERED: ReadonlySet<QueryOutcome['status']> = new Set(['table', 'person-forms', 'form']);

function setupLogger(options: GlobalOptions): void {
  setLogger(
    new ConsoleLogger({
      verbose: options.verbose === true,
      quiet: options.quiet === true,
      // Keep stdout parseable when emitting JSON
      stderrOnly: options.json === true,
    })
  );
}

function bootstrap(options: GlobalOptions, deps: CommandDeps): App {
  const loaded = loadConfig({
    ...(options.config !== undefined && { configPath: options.config }),
    ...(deps.cwd !== undefined && { cwd: deps.cwd }),
    ...(deps.env !== undefined && { env: deps.env }),
  });

  if (loaded.source) {
    logger.debug(`Using configuration from ${loaded.source}`);
  }

  const interactive = !options.json && !options.quiet && process.stderr.isTTY === true;
  const app = createApp(loaded.config, {
    ...(interactive && {
      decorateProvider: (provider: ConjugationProvider) => new SpinnerProvider(provider),
    }),
    ...deps.appOptions,
  });

  for (const warning of [...loaded.warnings, ...app.warnings]) {
    logger.warning(warning);
  }

  return app;
}

function handleError(error: unknown, options: GlobalOptions): number {
  if (error instanceof ConfigValidationError) {
    logger.error(error.message);
    for (const issue of error.issues) {
      logger.error(`  • ${issue}`);
    }
    return 1;
  }

  if (error instanceof Error) {
    logger.error(`Error: ${error.message}`);
    if (options.verbose && error.stack) {
      console.error(error.stack);
    }
  } else {
    logger.error('An unknown error occurred');
  }
  return 1;
}

export async function queryCommand(
  query: ConjugationQuery,
  options: GlobalOptions,
  deps: CommandDeps = {}
): Promise<number> {
  setupLogger(options);

  try {
    const app = bootstrap(options, deps);
    const outcome = await app.service.query(query);
    const answered = ANSWERED.has(outcome.status);

    if (options.json) {
      console.log(new JsonReporter().renderOutcome(outcome));
      return answered ? 0 : 1;
    }

    const rendered = new TableReporter().renderOutcome(outcome);
    if (rendered !== undefined) {
      console.log(rendered);
      return 0;
    }

    logger.error(describeFailure(outcome) ?? 'No result');
    if (outcome.status === 'unknown-tense') {
      logger.info("Use 'cj aliases' to see available tense aliases");
    }
    return 1;
  } catch (error) {
    return handleError(error, options);
  }
}

export function aliasesCommand(options: GlobalOptions, deps: CommandDeps = {}): number {
  setupLogger(options);

  try {
    const app = bootstrap(options, deps);
    const tenses = app.resolver.listTenses();

    if (options.json) {
      console.log(new JsonReporter().renderAliases(tenses));
      return 0;
    }

    logger.header('Tense aliases');
    console.log(new TableReporter().renderAliases(tenses));
    logger.info("Use any alias in place of the full tense name, e.g. 'cj form je avoir fut'");
    return 0;
  } catch (error) {
    return handleError(error, options);
  }
}

export function cacheCommand(
  action: CacheAction,
  options: CacheOptions,
  deps: CommandDeps = {}
): number {
  setupLogger(options);

  try {
    const app = bootstrap(options, deps);
    const { registry } = app;
    const namespace = options.namespace;

    if (namespace !== undefined && !registry.has(namespace)) {
      logger.error(
        `Unknown cache '${namespace}'. Known caches: ${registry.namespaces().join(', ')}`
      );
      return 1;
    }

    switch (action) {
      case 'stats': {
        if (namespace !== undefined) {
          const namespaceStats = { namespace, ...registry.open(namespace).stats() };
          console.log(
            options.json
              ? new JsonReporter().renderStats(namespaceStats)
              : new TableReporter().renderNamespaceStats(namespaceStats)
          );
          return 0;
        }

        const stats = registry.statsAll();
        if (options.json) {
          console.log(new JsonReporter().renderStats(stats));
        } else {
          logger.header('Cache statistics');
          console.log(new TableReporter().renderStats(stats));
        }
        return 0;
      }

      case 'clear': {
        if (namespace !== undefined) {
          registry.open(namespace).clear();
          report(options, { cleared: 1, namespace }, `Cache '${namespace}' cleared`);
          return 0;
        }

        const cleared = registry.clearAll();
        if (cleared > 0) {
          report(options, { cleared }, `Cleared ${cleared} cache(s)`);
        } else {
          report(options, { cleared: 0 }, undefined, 'No caches to clear');
        }
        return 0;
      }

      case 'cleanup': {
        const removed =
          namespace !== undefined
            ? registry.open(namespace).cleanupExpired()
            : registry.cleanupExpiredAll();
        if (removed > 0) {
          report(options, { removed }, `Removed ${removed} expired entries`);
        } else {
          report(options, { removed }, undefined, 'No expired entries found');
        }
        return 0;
      }
    }
  } catch (error) {
    return handleError(error, options);
  }
}

function report(
  options: GlobalOptions,
  data: Record<string, unknown>,
  successMessage: string | undefined,
  infoMessage?: string
): void {
  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
    return;
  }
  if (successMessage !== undefined) {
    logger.success(successMessage);
  }
  if (infoMessage !== undefined) {
    logger.info(infoMessage);
  }
}

export function buildProgram(deps: CommandDeps = {}): Command {
  const program = new Command();

  program
    .name('cj')
    .description('🇫🇷 French verb conjugations with alias-aware lookups and a persistent cache')
    .version('1.0.0')
    .option('-c, --config <path>', 'Path to a YAML configuration file (default: ./cj.config.yml)')
    .option('--json', 'Print machine-readable JSON', false)
    .option('-v, --verbose', 'Enable verbose logging', false)
    .option('-q, --quiet', 'Minimal output (only errors and results)', false)
    .hook('preAction', () => {
      const options: GlobalOptions = program.opts();
      if (options.verbose && options.quiet) {
        program.error('Error: --verbose and --quiet cannot be used together');
      }
    });

  const globals = (): GlobalOptions => program.opts();

  program
    .command('all')
    .description('Show every conjugation of a verb')
    .argument('<verb>', 'Infinitive, e.g. être')
    .action(async (verb: string) => {
      process.exitCode = await queryCommand({ kind: 'all', verb }, globals(), deps);
    });

  program
    .command('person')
    .description('Show every tense of a verb for one person')
    .argument('<person>', 'je, tu, il/elle/on, nous, vous, ils/elles')
    .argument('<verb>', 'Infinitive')
    .action(async (person: string, verb: string) => {
      process.exitCode = await queryCommand({ kind: 'person', verb, person }, globals(), deps);
    });

  program
    .command('form')
    .description('Show one conjugated form, e.g. cj form tu manger p')
    .argument('<person>', 'je, tu, il/elle/on, nous, vous, ils/elles')
    .argument('<verb>', 'Infinitive')
    .argument('<tense>', "Tense name or alias (see 'cj aliases')")
    .action(async (person: string, verb: string, tense: string) => {
      process.exitCode = await queryCommand({ kind: 'form', verb, person, tense }, globals(), deps);
    });

  program
    .command('impersonal')
    .description('Show an infinitive or participle, e.g. cj impersonal manger pp')
    .argument('<verb>', 'Infinitive')
    .argument('<tense>', 'Infinitive or participle tense name or alias')
    .action(async (verb: string, tense: string) => {
      process.exitCode = await queryCommand({ kind: 'impersonal', verb, tense }, globals(), deps);
    });

  program
    .command('aliases')
    .description('List every tense alias')
    .action(() => {
      process.exitCode = aliasesCommand(globals(), deps);
    });

  program
    .command('cache')
    .description('Inspect or maintain the result caches')
    .addArgument(new Argument('[action]', 'What to do').choices(CACHE_ACTIONS).default('stats'))
    .option('-n, --namespace <name>', 'Limit the action to one cache')
    .action((action: CacheAction, cacheOptions: { namespace?: string }) => {
      process.exitCode = cacheCommand(
        action,
        { ...globals(), namespace: cacheOptions.namespace },
        deps
      );
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();

  if (argv.length < 3) {
    program.help();
  }

  await program.parseAsync(argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
