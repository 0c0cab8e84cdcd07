import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { ProviderError } from './errors';
import {
  type ConjugationPayload,
  ConjugationPayloadSchema,
  type ConjugationProvider,
} from './types';

export interface JsonDirectoryProviderOptions {
  dataDir: string;
}

/**
 * Reads `<dataDir>/<verb>.json`, one pre-computed conjugation table per verb.
 */
export class JsonDirectoryProvider implements ConjugationProvider {
  readonly name = 'json-directory';
  private readonly dataDir: string;

  constructor(options: JsonDirectoryProviderOptions) {
    this.dataDir = options.dataDir;
  }

  async conjugate(verb: string): Promise<ConjugationPayload> {
    const normalized = verb.normalize('NFC').trim().toLowerCase();
    if (normalized.length === 0 || /[\\/]|^\.+$/.test(normalized)) {
      throw new ProviderError(verb, 'unknown-verb', `'${verb}' is not a verb name`);
    }

    const filePath = path.join(this.dataDir, `${normalized}.json`);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new ProviderError(verb, 'unknown-verb', `No conjugation data for '${verb}'`, error);
      }
      throw new ProviderError(verb, 'unavailable', `Could not read ${filePath}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ProviderError(verb, 'invalid-payload', `${filePath} is not valid JSON`, error);
    }

    const result = ConjugationPayloadSchema.safeParse(parsed);
    if (!result.success) {
      const first = result.error.issues[0];
      const detail = first ? `${first.path.join('.') || 'root'}: ${first.message}` : 'unknown';
      throw new ProviderError(
        verb,
        'invalid-payload',
        `${filePath} is not a conjugation table (${detail})`,
        result.error
      );
    }

    return result.data;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
