import { z } from 'zod';
import { INFERENCE_MAX_BATCH_SIZE, INFERENCE_TIMEOUT_MS, VECTOR_INDEX_TIMEOUT_MS } from '../constants/limits';

// dotenv leaves blank assignments as empty strings
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const requiredString = (description: string) =>
  z.preprocess(blankAsUndefined, z.string({ required_error: 'is required' }).min(1)).describe(description);

const optionalString = (description: string) =>
  z.preprocess(blankAsUndefined, z.string().min(1).optional()).describe(description);

const positiveInt = (fallback: number, description: string) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(fallback)).describe(description);

/**
 * Environment configuration shared by the indexer and searcher CLIs
 */
export const appConfigSchema = z.object({
  SUPABASE_URL: requiredString('Supabase project URL'),
  SUPABASE_SERVICE_ROLE_KEY: requiredString('Supabase service role key'),
  STORAGE_BUCKET: z.preprocess(blankAsUndefined, z.string().min(1).default('images')).describe('Bucket for originals'),
  QDRANT_URL: requiredString('Qdrant REST endpoint'),
  QDRANT_API_KEY: optionalString('Qdrant API key'),
  QDRANT_TIMEOUT_MS: positiveInt(VECTOR_INDEX_TIMEOUT_MS, 'Vector index call timeout'),
  COLLECTION_NAME: z.preprocess(blankAsUndefined, z.string().min(1).default('images')).describe('Target collection'),
  INFERENCE_URL: requiredString('Inference server base URL'),
  INFERENCE_API_KEY: optionalString('Inference server bearer token'),
  INFERENCE_TIMEOUT_MS: positiveInt(INFERENCE_TIMEOUT_MS, 'Inference call timeout'),
  INFERENCE_MAX_BATCH: positiveInt(INFERENCE_MAX_BATCH_SIZE, 'Largest batch sent per inference request'),
  LOG_LEVEL: z
    .preprocess(blankAsUndefined, z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'))
    .describe('pino log level')
});

export type AppConfig = z.infer<typeof appConfigSchema>;
