import * as logger from '../logging';
import { defaultTaxonomy, normalizeAlias } from './taxonomy';
import {
  IMPERATIVE_PERSONS,
  PERSON_KEYS,
  type ConjugationTable,
  type Lookup,
  type PersonForm,
  type PersonKey,
  type RowShape,
  type TableCell,
  type TableRow,
  type Taxonomy,
  type TenseDefinition,
  type TenseKey,
  type TenseLocation,
} from './types';

const ROW_ARITY: Record<Exclude<RowShape, 'impersonal'>, number> = {
  full: PERSON_KEYS.length,
  imperative: IMPERATIVE_PERSONS.length,
};

type RowCheck = { ok: true; forms: string[] } | { ok: false; problem: string };

function checkRow(row: unknown, shape: RowShape): RowCheck {
  if (!Array.isArray(row)) {
    return { ok: false, problem: 'row is not a list of forms' };
  }

  const forms: string[] = [];
  for (const item of row) {
    if (typeof item !== 'string') {
      return { ok: false, problem: 'row contains a value that is not text' };
    }
    forms.push(item);
  }

  if (shape === 'impersonal') {
    return forms.length > 0 ? { ok: true, forms } : { ok: false, problem: 'row is empty' };
  }

  const expected = ROW_ARITY[shape];
  if (forms.length !== expected) {
    return { ok: false, problem: `expected ${expected} forms, found ${forms.length}` };
  }
  return { ok: true, forms };
}

function personsOf(shape: RowShape): readonly PersonKey[] {
  switch (shape) {
    case 'full':
      return PERSON_KEYS;
    case 'imperative':
      return IMPERATIVE_PERSONS;
    case 'impersonal':
      return [];
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Canonicalizes person and tense input and navigates conjugation tables.
 *
 * Resolution is exact alias membership after trimming and lower-casing. When an
 * alias is declared by several keys the first declared key wins.
 */
export class AliasResolver {
  private readonly taxonomy: Taxonomy;
  private readonly personAliases: ReadonlyMap<string, PersonKey>;
  private readonly tenseAliases: ReadonlyMap<string, TenseKey>;
  private readonly tensesByKey: ReadonlyMap<TenseKey, TenseDefinition>;

  constructor(taxonomy: Taxonomy = defaultTaxonomy()) {
    this.taxonomy = taxonomy;
    this.personAliases = indexAliases(taxonomy.persons);
    this.tenseAliases = indexAliases(taxonomy.tenses);
    this.tensesByKey = new Map(taxonomy.tenses.map((tense) => [tense.key, tense]));
  }

  resolvePerson(input: string): PersonKey | undefined {
    return this.personAliases.get(normalizeAlias(input));
  }

  resolveTense(input: string): TenseKey | undefined {
    return this.tenseAliases.get(normalizeAlias(input));
  }

  locateTense(tenseKey: TenseKey): TenseLocation | undefined {
    const definition = this.tensesByKey.get(tenseKey);
    return definition ? { mood: definition.mood, tense: definition.tense } : undefined;
  }

  classifyRowShape(mood: string, tense: string): RowShape {
    const exact = this.taxonomy.rowShapes.find(
      (rule) => rule.mood === mood && rule.tense === tense
    );
    if (exact) {
      return exact.shape;
    }
    const moodWide = this.taxonomy.rowShapes.find(
      (rule) => rule.mood === mood && rule.tense === undefined
    );
    return moodWide?.shape ?? 'full';
  }

  isImpersonalTense(tenseKey: TenseKey): boolean {
    const location = this.locateTense(tenseKey);
    if (!location) {
      return false;
    }
    return this.classifyRowShape(location.mood, location.tense) === 'impersonal';
  }

  listTenses(): readonly TenseDefinition[] {
    return this.taxonomy.tenses;
  }

  listPersons(): readonly PersonKey[] {
    return PERSON_KEYS;
  }

  extract(table: ConjugationTable, mood: string, tense: string, person?: PersonKey): Lookup {
    const moodRows = table[mood];
    if (!isRecord(moodRows)) {
      return { found: false, reason: 'unknown-mood' };
    }
    if (!Object.hasOwn(moodRows, tense)) {
      return { found: false, reason: 'unknown-tense' };
    }

    const shape = this.classifyRowShape(mood, tense);
    const check = checkRow(moodRows[tense], shape);
    if (!check.ok) {
      reportMalformedRow(mood, tense, check.problem);
      return { found: false, reason: 'malformed-row' };
    }

    if (shape === 'impersonal') {
      return { found: true, form: check.forms[0], shape };
    }

    if (person === undefined) {
      return { found: false, reason: 'person-required' };
    }

    const index = personsOf(shape).indexOf(person);
    const form = index === -1 ? undefined : check.forms[index];
    if (form === undefined) {
      return { found: false, reason: 'person-not-applicable' };
    }
    return { found: true, form, shape };
  }

  /**
   * Every form of one person, mood by mood in table order. Impersonal rows have
   * no person and are left out; imperative rows only answer for tu, nous, vous.
   * Each iteration walks the table afresh.
   */
  extractAllForPerson(table: ConjugationTable, person: PersonKey): Iterable<PersonForm> {
    const rows = () => this.rows(table);
    return {
      *[Symbol.iterator]() {
        for (const row of rows()) {
          const cell = row.cells.find((candidate) => candidate.person === person);
          if (cell) {
            yield { mood: row.mood, tense: row.tense, form: cell.form };
          }
        }
      },
    };
  }

  /**
   * Every well-formed row with its forms paired to persons. Malformed rows are
   * reported and skipped.
   */
  extractAll(table: ConjugationTable): Iterable<TableRow> {
    const rows = () => this.rows(table);
    return {
      [Symbol.iterator]: rows,
    };
  }

  private *rows(table: ConjugationTable): Generator<TableRow> {
    for (const [mood, moodRows] of Object.entries(table)) {
      if (!isRecord(moodRows)) {
        reportMalformedRow(mood, '*', 'mood is not a table of tenses');
        continue;
      }

      for (const [tense, row] of Object.entries(moodRows)) {
        const shape = this.classifyRowShape(mood, tense);
        const check = checkRow(row, shape);
        if (!check.ok) {
          reportMalformedRow(mood, tense, check.problem);
          continue;
        }

        const persons = personsOf(shape);
        const cells: TableCell[] = check.forms.map((form, index) => {
          const cellPerson = persons[index];
          return cellPerson === undefined ? { form } : { person: cellPerson, form };
        });
        yield { mood, tense, shape, cells };
      }
    }
  }
}

function indexAliases<K extends string>(
  definitions: readonly { key: K; aliases: readonly string[] }[]
): Map<string, K> {
  const index = new Map<string, K>();
  for (const definition of definitions) {
    for (const alias of definition.aliases) {
      const normalized = normalizeAlias(alias);
      if (!index.has(normalized)) {
        index.set(normalized, definition.key);
      }
    }
  }
  return index;
}

function reportMalformedRow(mood: string, tense: string, problem: string): void {
  logger.warning(`Skipping malformed row ${mood} / ${tense}: ${problem}`);
}
