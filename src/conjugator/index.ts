export { ConjugationService, normalizeVerb } from './service';
export type { ConjugationServiceOptions } from './service';
export type { ConjugationQuery, QueryKind, QueryOutcome, QueryStatus, VerbInfo } from './types';
