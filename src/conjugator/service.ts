import type { ResultCache } from '../cache';
import type { AliasResolver, PersonKey, TenseKey } from '../grammar';
import * as logger from '../logging';
import {
  type ConjugationPayload,
  ConjugationPayloadSchema,
  type ConjugationProvider,
  ProviderError,
} from '../provider';
import type { ConjugationQuery, QueryOutcome } from './types';

export interface ConjugationServiceOptions {
  resolver: AliasResolver;
  cache: ResultCache;
  provider: ConjugationProvider;
}

type PayloadResult =
  | { ok: true; payload: ConjugationPayload }
  | { ok: false; outcome: QueryOutcome };

export function normalizeVerb(verb: string): string {
  return verb.normalize('NFC').trim().toLowerCase();
}

/**
 * Answers conjugation queries: resolve tokens, consult the cache, fall back to
 * the provider on a miss, then navigate the table. Every failure comes back as
 * an outcome; nothing here throws for a missing answer.
 */
export class ConjugationService {
  private readonly resolver: AliasResolver;
  private readonly cache: ResultCache;
  private readonly provider: ConjugationProvider;

  constructor(options: ConjugationServiceOptions) {
    this.resolver = options.resolver;
    this.cache = options.cache;
    this.provider = options.provider;
  }

  async query(query: ConjugationQuery): Promise<QueryOutcome> {
    switch (query.kind) {
      case 'all':
        return this.all(query.verb);
      case 'person':
        return this.forPerson(query.verb, query.person);
      case 'form':
        return this.form(query.verb, query.person, query.tense);
      case 'impersonal':
        return this.impersonal(query.verb, query.tense);
    }
  }

  private async all(rawVerb: string): Promise<QueryOutcome> {
    const verb = normalizeVerb(rawVerb);
    const loaded = await this.load(verb, 'all');
    if (!loaded.ok) {
      return loaded.outcome;
    }

    const rows = [...this.resolver.extractAll(loaded.payload.moods)];
    if (rows.length === 0) {
      return { status: 'not-found', verb, reason: 'no-forms' };
    }

    const info = loaded.payload.verb;
    return info ? { status: 'table', verb, info, rows } : { status: 'table', verb, rows };
  }

  private async forPerson(rawVerb: string, personInput: string): Promise<QueryOutcome> {
    const person = this.resolver.resolvePerson(personInput);
    if (!person) {
      return { status: 'unknown-person', input: personInput };
    }

    const verb = normalizeVerb(rawVerb);
    const loaded = await this.load(verb, 'person', person);
    if (!loaded.ok) {
      return loaded.outcome;
    }

    const forms = [...this.resolver.extractAllForPerson(loaded.payload.moods, person)];
    if (forms.length === 0) {
      return { status: 'not-found', verb, reason: 'no-forms', person };
    }
    return { status: 'person-forms', verb, person, forms };
  }

  private async form(
    rawVerb: string,
    personInput: string,
    tenseInput: string
  ): Promise<QueryOutcome> {
    const tense = this.resolver.resolveTense(tenseInput);
    if (!tense) {
      return { status: 'unknown-tense', input: tenseInput };
    }

    const person = this.resolver.resolvePerson(personInput);
    if (!person) {
      return { status: 'unknown-person', input: personInput };
    }

    // Infinitive and participle forms have no person to match
    if (this.resolver.isImpersonalTense(tense)) {
      return this.impersonal(rawVerb, tenseInput);
    }

    const verb = normalizeVerb(rawVerb);
    const loaded = await this.load(verb, 'specific', person, tense);
    if (!loaded.ok) {
      return loaded.outcome;
    }
    return this.pick(verb, loaded.payload, tense, person);
  }

  private async impersonal(rawVerb: string, tenseInput: string): Promise<QueryOutcome> {
    const tense = this.resolver.resolveTense(tenseInput);
    if (!tense) {
      return { status: 'unknown-tense', input: tenseInput };
    }
    if (!this.resolver.isImpersonalTense(tense)) {
      return { status: 'person-required', tense };
    }

    const verb = normalizeVerb(rawVerb);
    const loaded = await this.load(verb, 'impersonal', tense);
    if (!loaded.ok) {
      return loaded.outcome;
    }
    return this.pick(verb, loaded.payload, tense);
  }

  private pick(
    verb: string,
    payload: ConjugationPayload,
    tense: TenseKey,
    person?: PersonKey
  ): QueryOutcome {
    const location = this.resolver.locateTense(tense);
    if (!location) {
      return { status: 'unknown-tense', input: tense };
    }

    const lookup = this.resolver.extract(payload.moods, location.mood, location.tense, person);
    if (!lookup.found) {
      return person
        ? { status: 'not-found', verb, reason: lookup.reason, person, tense }
        : { status: 'not-found', verb, reason: lookup.reason, tense };
    }

    if (lookup.shape === 'impersonal' || !person) {
      return { status: 'form', verb, tense, form: lookup.form, shape: lookup.shape };
    }
    return { status: 'form', verb, tense, person, form: lookup.form, shape: lookup.shape };
  }

  /**
   * Cached payload for `(verb, queryKind, ...tokens)`, or a fresh one from the
   * provider, stored on success. A cached value that no longer parses is
   * treated as a miss.
   */
  private async load(
    verb: string,
    queryKind: string,
    ...tokens: string[]
  ): Promise<PayloadResult> {
    const cached = this.cache.get(verb, queryKind, ...tokens);
    if (cached !== undefined) {
      const parsed = ConjugationPayloadSchema.safeParse(cached);
      if (parsed.success) {
        return { ok: true, payload: parsed.data };
      }
      logger.debug(`Ignoring cached entry for '${verb}' that is not a conjugation table`);
    }

    let payload: ConjugationPayload;
    try {
      payload = await this.provider.conjugate(verb);
    } catch (error) {
      const failure =
        error instanceof ProviderError
          ? error
          : new ProviderError(
              verb,
              'unavailable',
              error instanceof Error ? error.message : String(error),
              error
            );
      logger.debug(`${this.provider.name} could not conjugate '${verb}': ${failure.message}`);
      return {
        ok: false,
        outcome: {
          status: 'provider-failure',
          verb,
          reason: failure.reason,
          message: failure.message,
        },
      };
    }

    this.cache.set(payload, verb, queryKind, ...tokens);
    return { ok: true, payload };
  }
}
