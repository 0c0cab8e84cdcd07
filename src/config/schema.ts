import { z } from 'zod';

const NamespaceSchema = z
  .object({
    max_age_days: z.number().min(0),
  })
  .strict();

export const DEFAULT_NAMESPACES = {
  conjugation: { max_age_days: 30 },
  wordreference: { max_age_days: 7 },
  larousse: { max_age_days: 14 },
} as const;

const CacheSchema = z
  .object({
    enabled: z.boolean().default(true),
    directory: z.string().min(1).optional(),
    namespaces: z
      .record(z.string().regex(/^[a-z0-9][a-z0-9_-]*$/), NamespaceSchema)
      .default(DEFAULT_NAMESPACES),
  })
  .strict();

const ProviderSchema = z
  .object({
    data_dir: z.string().min(1).optional(),
  })
  .strict();

const GrammarSchema = z
  .object({
    taxonomy: z.string().min(1).optional(),
  })
  .strict();

export const AppConfigSchema = z
  .object({
    version: z.literal(1),
    cache: CacheSchema.default({}),
    provider: ProviderSchema.default({}),
    grammar: GrammarSchema.default({}),
  })
  .strict();

export type RawAppConfig = z.infer<typeof AppConfigSchema>;
