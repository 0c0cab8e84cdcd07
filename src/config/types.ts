import type { CacheConfig } from '../cache';

export interface ProviderConfig {
  dataDir: string;
}

export interface GrammarConfig {
  /** Custom taxonomy file; the bundled French tables are used when absent. */
  taxonomy?: string;
}

export interface AppConfig {
  cache: CacheConfig;
  provider: ProviderConfig;
  grammar: GrammarConfig;
}

export interface ConfigLoadResult {
  config: AppConfig;
  warnings: string[];
  /** File the configuration came from, if any. */
  source?: string;
}
