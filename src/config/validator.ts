import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { ZodError } from 'zod';
import type { NamespaceConfig } from '../cache';
import { ConfigValidationError, formatZodIssues } from './errors';
import { AppConfigSchema, type RawAppConfig } from './schema';
import type { AppConfig, ConfigLoadResult } from './types';

export const DEFAULT_CONFIG_FILE = 'cj.config.yml';

export const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.cache', 'french-tools');

export const DEFAULT_DATA_DIR = path.resolve(__dirname, '..', '..', 'data', 'verbs');

export interface ConfigEnvironment {
  CJ_CACHE_DIR?: string | undefined;
  CJ_DATA_DIR?: string | undefined;
}

export interface LoadConfigOptions {
  /** Explicit configuration file; it must exist. */
  configPath?: string;
  cwd?: string;
  env?: ConfigEnvironment;
}

export function validateFromString(yamlContent: string, sourcePath?: string): ConfigLoadResult {
  let parsedYaml: unknown;

  try {
    parsedYaml = yaml.load(yamlContent);
  } catch (error) {
    const message = `Invalid YAML syntax${sourcePath ? ` in ${sourcePath}` : ''}`;
    throw new ConfigValidationError(message, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let raw: RawAppConfig;
  try {
    raw = AppConfigSchema.parse(parsedYaml ?? { version: 1 });
  } catch (error) {
    if (error instanceof ZodError) {
      const message = `Configuration validation failed${sourcePath ? ` for ${sourcePath}` : ''}`;
      throw new ConfigValidationError(message, formatZodIssues(error, getFieldContext));
    }
    throw error;
  }

  const baseDir = sourcePath ? path.dirname(sourcePath) : process.cwd();
  const config = toAppConfig(raw, baseDir);
  const result: ConfigLoadResult = { config, warnings: validateDefaults(config) };
  if (sourcePath) {
    result.source = sourcePath;
  }
  return result;
}

export function validateFromFile(configPath: string): ConfigLoadResult {
  if (!fs.existsSync(configPath)) {
    throw new ConfigValidationError(`Configuration file not found: ${configPath}`);
  }

  const fileContent = fs.readFileSync(configPath, 'utf8');
  return validateFromString(fileContent, configPath);
}

/**
 * Explicit file, else `cj.config.yml` in the working directory, else defaults.
 * Environment variables override the cache and data directories last.
 */
export function loadConfig(options: LoadConfigOptions = {}): ConfigLoadResult {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let result: ConfigLoadResult;
  if (options.configPath) {
    result = validateFromFile(path.resolve(cwd, options.configPath));
  } else {
    const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
    result = fs.existsSync(candidate) ? validateFromFile(candidate) : defaultConfig();
  }

  if (env.CJ_CACHE_DIR) {
    result.config.cache.directory = path.resolve(cwd, expandHome(env.CJ_CACHE_DIR));
  }
  if (env.CJ_DATA_DIR) {
    result.config.provider.dataDir = path.resolve(cwd, expandHome(env.CJ_DATA_DIR));
  }

  return result;
}

export function defaultConfig(): ConfigLoadResult {
  return validateFromString('version: 1');
}

export function validateDefaults(config: AppConfig): string[] {
  const warnings: string[] = [];

  if (!config.cache.enabled) {
    warnings.push('Caching is disabled, every query will consult the conjugation provider');
  }

  for (const [namespace, settings] of Object.entries(config.cache.namespaces)) {
    if (settings.maxAgeDays === 0) {
      warnings.push(`Cache '${namespace}' has max_age_days 0, its entries expire immediately`);
    }
  }

  if (Object.keys(config.cache.namespaces).length === 0) {
    warnings.push('No cache namespaces are configured, cache statistics will be empty');
  }

  return warnings;
}

function toAppConfig(raw: RawAppConfig, baseDir: string): AppConfig {
  const namespaces: Record<string, NamespaceConfig> = {};
  for (const [namespace, settings] of Object.entries(raw.cache.namespaces)) {
    namespaces[namespace] = { maxAgeDays: settings.max_age_days };
  }

  const config: AppConfig = {
    cache: {
      enabled: raw.cache.enabled,
      directory: raw.cache.directory
        ? path.resolve(baseDir, expandHome(raw.cache.directory))
        : DEFAULT_CACHE_DIR,
      namespaces,
    },
    provider: {
      dataDir: raw.provider.data_dir
        ? path.resolve(baseDir, expandHome(raw.provider.data_dir))
        : DEFAULT_DATA_DIR,
    },
    grammar: {},
  };

  if (raw.grammar.taxonomy) {
    config.grammar.taxonomy = path.resolve(baseDir, expandHome(raw.grammar.taxonomy));
  }

  return config;
}

function expandHome(value: string): string {
  if (value === '~') {
    return os.homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

function getFieldContext(fieldPath: string): string {
  const fieldDescriptions: Record<string, string> = {
    version: "The 'version' field must be exactly 1 (current schema version)",
    'cache.enabled': 'Turns the persistent result cache on or off',
    'cache.directory': 'Directory holding one <namespace>.json file per cache',
    'cache.namespaces': 'Per-cache expiry, e.g. conjugation: { max_age_days: 30 }',
    'provider.data_dir': 'Directory of <verb>.json conjugation tables',
    'grammar.taxonomy': 'JSON file replacing the bundled person and tense aliases',
  };

  if (fieldDescriptions[fieldPath]) {
    return fieldDescriptions[fieldPath];
  }

  for (const [key, description] of Object.entries(fieldDescriptions)) {
    if (fieldPath.startsWith(key)) {
      return description;
    }
  }

  return '';
}
