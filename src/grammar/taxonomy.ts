import * as fs from 'node:fs';
import { ZodError, z } from 'zod';
import { ConfigValidationError, formatZodIssues } from '../config/errors';
import frenchTaxonomy from './data/french.json';
import {
  PERSON_KEYS,
  ROW_SHAPES,
  type PersonDefinition,
  type RowShapeRule,
  type Taxonomy,
  type TenseDefinition,
} from './types';

const AliasListSchema = z.array(z.string().trim().min(1)).min(1);

const PersonSchema = z.object({
  key: z.enum(PERSON_KEYS),
  aliases: AliasListSchema,
});

const TenseSchema = z.object({
  key: z.string().trim().min(1),
  mood: z.string().min(1),
  tense: z.string().min(1),
  aliases: AliasListSchema,
});

const RowShapeRuleSchema = z.object({
  mood: z.string().min(1),
  tense: z.string().min(1).optional(),
  shape: z.enum(ROW_SHAPES),
});

export const TaxonomySchema = z
  .object({
    language: z.string().min(1),
    persons: z.array(PersonSchema),
    tenses: z.array(TenseSchema).min(1),
    rowShapes: z.array(RowShapeRuleSchema).default([]),
  })
  .superRefine((value, ctx) => {
    for (const key of PERSON_KEYS) {
      const count = value.persons.filter((person) => person.key === key).length;
      if (count !== 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['persons'],
          message: `Person '${key}' must be declared exactly once (found ${count})`,
        });
      }
    }

    const seen = new Set<string>();
    value.tenses.forEach((tense, index) => {
      if (seen.has(tense.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tenses', index, 'key'],
          message: `Tense '${tense.key}' is declared more than once`,
        });
      }
      seen.add(tense.key);
    });
  });

export interface TaxonomyResult {
  taxonomy: Taxonomy;
  warnings: string[];
}

/**
 * Alias comparison form: trimmed, lower-cased, NFC-composed so that a decomposed
 * "é" typed in some terminals matches the precomposed one in the tables.
 */
export function normalizeAlias(value: string): string {
  return value.normalize('NFC').trim().toLowerCase();
}

export function parseTaxonomy(raw: unknown, source = 'taxonomy'): TaxonomyResult {
  let parsed: z.infer<typeof TaxonomySchema>;
  try {
    parsed = TaxonomySchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError(
        `Grammar taxonomy validation failed for ${source}`,
        formatZodIssues(error)
      );
    }
    throw error;
  }

  const persons: PersonDefinition[] = parsed.persons.map((person) => ({
    key: person.key,
    aliases: person.aliases.map(normalizeAlias),
  }));

  const tenses: TenseDefinition[] = parsed.tenses.map((tense) => ({
    key: tense.key,
    mood: tense.mood,
    tense: tense.tense,
    aliases: tense.aliases.map(normalizeAlias),
  }));

  const rowShapes: RowShapeRule[] = parsed.rowShapes.map((rule) =>
    rule.tense === undefined
      ? { mood: rule.mood, shape: rule.shape }
      : { mood: rule.mood, tense: rule.tense, shape: rule.shape }
  );

  const taxonomy: Taxonomy = { language: parsed.language, persons, tenses, rowShapes };
  return { taxonomy, warnings: findAliasOverlaps(taxonomy) };
}

export function loadTaxonomyFile(filePath: string): TaxonomyResult {
  if (!fs.existsSync(filePath)) {
    throw new ConfigValidationError(`Grammar taxonomy not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigValidationError(`Invalid JSON in grammar taxonomy ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return parseTaxonomy(raw, filePath);
}

export function defaultTaxonomy(): Taxonomy {
  return parseTaxonomy(frenchTaxonomy, 'bundled French taxonomy').taxonomy;
}

/**
 * Aliases claimed by more than one canonical key. Resolution keeps the first
 * declaration; each overlap is reported so the table author can fix it.
 */
export function findAliasOverlaps(taxonomy: Taxonomy): string[] {
  return [
    ...overlapsWithin('person', taxonomy.persons),
    ...overlapsWithin('tense', taxonomy.tenses),
  ];
}

function overlapsWithin(
  kind: string,
  definitions: readonly { key: string; aliases: readonly string[] }[]
): string[] {
  const owners = new Map<string, string>();
  const warnings: string[] = [];

  for (const definition of definitions) {
    for (const alias of new Set(definition.aliases)) {
      const owner = owners.get(alias);
      if (owner === undefined) {
        owners.set(alias, definition.key);
      } else if (owner !== definition.key) {
        warnings.push(
          `${kind} alias '${alias}' is declared by both '${owner}' and '${definition.key}'; '${owner}' wins`
        );
      }
    }
  }

  return warnings;
}
