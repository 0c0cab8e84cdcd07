import type { NotFoundReason, PersonForm, PersonKey, RowShape, TableRow, TenseKey } from '../grammar';
import type { ConjugationPayload, ProviderFailureReason } from '../provider';

/**
 * The query shape is chosen by the caller; the service never guesses whether an
 * argument is a person, a verb or a tense.
 */
export type ConjugationQuery =
  | { kind: 'all'; verb: string }
  | { kind: 'person'; verb: string; person: string }
  | { kind: 'form'; verb: string; person: string; tense: string }
  | { kind: 'impersonal'; verb: string; tense: string };

export type QueryKind = ConjugationQuery['kind'];

export type VerbInfo = NonNullable<ConjugationPayload['verb']>;

export type QueryOutcome =
  | { status: 'unknown-person'; input: string }
  | { status: 'unknown-tense'; input: string }
  | { status: 'person-required'; tense: TenseKey }
  | {
      status: 'provider-failure';
      verb: string;
      reason: ProviderFailureReason;
      message: string;
    }
  | {
      status: 'not-found';
      verb: string;
      reason: NotFoundReason | 'no-forms';
      person?: PersonKey;
      tense?: TenseKey;
    }
  | { status: 'table'; verb: string; info?: VerbInfo; rows: TableRow[] }
  | { status: 'person-forms'; verb: string; person: PersonKey; forms: PersonForm[] }
  | {
      status: 'form';
      verb: string;
      tense: TenseKey;
      person?: PersonKey;
      form: string;
      shape: RowShape;
    };

export type QueryStatus = QueryOutcome['status'];
