export { ConfigValidationError, formatZodIssues } from './errors';
export { AppConfigSchema, DEFAULT_NAMESPACES } from './schema';
export type { RawAppConfig } from './schema';
export type { AppConfig, ConfigLoadResult, GrammarConfig, ProviderConfig } from './types';
export {
  DEFAULT_CACHE_DIR,
  DEFAULT_CONFIG_FILE,
  DEFAULT_DATA_DIR,
  defaultConfig,
  loadConfig,
  validateDefaults,
  validateFromFile,
  validateFromString,
} from './validator';
export type { ConfigEnvironment, LoadConfigOptions } from './validator';
