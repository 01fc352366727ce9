import { z } from 'zod';
import { RECOMMEND_MAX_POSITIVES } from '../constants/limits';

/**
 * Recommend query - positive examples plus search parameters
 */
export const recommendQuerySchema = z.object({
  positive: z
    .array(z.array(z.number()).min(1))
    .min(1)
    .max(RECOMMEND_MAX_POSITIVES)
    .describe('Positive example vectors'),
  limit: z.number().int().positive().describe('Maximum number of results'),
  scoreThreshold: z.number().optional().describe('Minimal score of returned points'),
  exact: z.boolean().default(false).describe('Exact instead of approximate search'),
  hnswEf: z.number().int().positive().optional().describe('HNSW search width')
});

export type RecommendQuery = z.input<typeof recommendQuerySchema>;
