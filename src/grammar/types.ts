export const PERSON_KEYS = ['je', 'tu', 'il', 'nous', 'vous', 'ils'] as const;

export type PersonKey = (typeof PERSON_KEYS)[number];

/** Persons of an imperative row, in row order. */
export const IMPERATIVE_PERSONS = ['tu', 'nous', 'vous'] as const satisfies readonly PersonKey[];

export const ROW_SHAPES = ['full', 'imperative', 'impersonal'] as const;

export type RowShape = (typeof ROW_SHAPES)[number];

/** Canonical tense name, e.g. `futur simple`. */
export type TenseKey = string;

export interface TenseLocation {
  mood: string;
  tense: string;
}

export interface TenseDefinition extends TenseLocation {
  key: TenseKey;
  aliases: readonly string[];
}

export interface PersonDefinition {
  key: PersonKey;
  aliases: readonly string[];
}

export interface RowShapeRule {
  mood: string;
  /** When absent the rule covers every tense of the mood. */
  tense?: string;
  shape: RowShape;
}

export interface Taxonomy {
  language: string;
  persons: readonly PersonDefinition[];
  tenses: readonly TenseDefinition[];
  rowShapes: readonly RowShapeRule[];
}

/**
 * Mood → tense → row, as supplied by a conjugation provider. Moods and rows are
 * left unchecked here; the resolver skips a mood that is not a table of tenses
 * and validates each row against its shape.
 */
export type ConjugationTable = Record<string, unknown>;

export type NotFoundReason =
  | 'unknown-mood'
  | 'unknown-tense'
  | 'person-required'
  | 'person-not-applicable'
  | 'malformed-row';

export type Lookup =
  | { found: true; form: string; shape: RowShape }
  | { found: false; reason: NotFoundReason };

export interface PersonForm {
  mood: string;
  tense: string;
  form: string;
}

export interface TableCell {
  person?: PersonKey;
  form: string;
}

export interface TableRow {
  mood: string;
  tense: string;
  shape: RowShape;
  cells: TableCell[];
}
