import { z } from 'zod';

export const VerbInfoSchema = z
  .object({
    infinitive: z.string().min(1),
    translation_en: z.string().optional(),
  })
  .passthrough();

/**
 * Raw provider result. Only the mood map itself is checked here: moods and rows
 * are validated later, one at a time, so a single bad entry never discards the
 * whole payload.
 */
export const ConjugationPayloadSchema = z
  .object({
    verb: VerbInfoSchema.optional(),
    moods: z.record(z.string(), z.unknown()),
  })
  .passthrough();

export type ConjugationPayload = z.infer<typeof ConjugationPayloadSchema>;

export type ProviderFailureReason = 'unknown-verb' | 'invalid-payload' | 'unavailable';

export interface ConjugationProvider {
  readonly name: string;
  /**
   * Full conjugation table of `verb`. Rejects with `ProviderError` when no
   * payload can be produced.
   */
  conjugate(verb: string): Promise<ConjugationPayload>;
}
