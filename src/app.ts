import { CacheRegistry, type CacheRegistryOptions } from './cache';
import type { AppConfig } from './config';
import { ConjugationService } from './conjugator';
import { AliasResolver, loadTaxonomyFile } from './grammar';
import { type ConjugationProvider, JsonDirectoryProvider } from './provider';

export const CONJUGATION_NAMESPACE = 'conjugation';

export interface AppOptions extends CacheRegistryOptions {
  /** Replaces the provider built from `config.provider`. */
  provider?: ConjugationProvider;
  /** Applied to whichever provider is used, e.g. to add a spinner. */
  decorateProvider?: (provider: ConjugationProvider) => ConjugationProvider;
}

export interface App {
  registry: CacheRegistry;
  resolver: AliasResolver;
  service: ConjugationService;
  warnings: string[];
}

export function createApp(config: AppConfig, options: AppOptions = {}): App {
  const warnings: string[] = [];

  let resolver: AliasResolver;
  if (config.grammar.taxonomy) {
    const loaded = loadTaxonomyFile(config.grammar.taxonomy);
    warnings.push(...loaded.warnings);
    resolver = new AliasResolver(loaded.taxonomy);
  } else {
    resolver = new AliasResolver();
  }

  const registry = new CacheRegistry(
    config.cache,
    options.storageFactory ? { storageFactory: options.storageFactory } : {}
  );

  const baseProvider =
    options.provider ?? new JsonDirectoryProvider({ dataDir: config.provider.dataDir });
  const provider = options.decorateProvider ? options.decorateProvider(baseProvider) : baseProvider;

  const service = new ConjugationService({
    resolver,
    cache: registry.open(CONJUGATION_NAMESPACE),
    provider,
  });

  return { registry, resolver, service, warnings };
}
