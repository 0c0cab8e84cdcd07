export { ProviderError } from './errors';
export { JsonDirectoryProvider } from './json-directory-provider';
export { SpinnerProvider } from './spinner-provider';
export type { JsonDirectoryProviderOptions } from './json-directory-provider';
export { ConjugationPayloadSchema, VerbInfoSchema } from './types';
export type { ConjugationPayload, ConjugationProvider, ProviderFailureReason } from './types';
