export { AliasResolver } from './resolver';
export {
  TaxonomySchema,
  defaultTaxonomy,
  findAliasOverlaps,
  loadTaxonomyFile,
  normalizeAlias,
  parseTaxonomy,
} from './taxonomy';
export type { TaxonomyResult } from './taxonomy';
export { IMPERATIVE_PERSONS, PERSON_KEYS, ROW_SHAPES } from './types';
export type {
  ConjugationTable,
  Lookup,
  NotFoundReason,
  PersonDefinition,
  PersonForm,
  PersonKey,
  RowShape,
  RowShapeRule,
  TableCell,
  TableRow,
  Taxonomy,
  TenseDefinition,
  TenseKey,
  TenseLocation,
} from './types';
