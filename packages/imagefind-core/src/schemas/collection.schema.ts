import { z } from 'zod';

export const distanceSchema = z.enum(['Cosine', 'Dot', 'Euclid', 'Manhattan']);

export type Distance = z.infer<typeof distanceSchema>;

/**
 * Collection creation parameters
 */
export const collectionSpecSchema = z.object({
  name: z.string().min(1).describe('Collection name'),
  dimension: z.number().int().positive().describe('Vector dimensionality'),
  distance: distanceSchema.default('Cosine'),
  onDisk: z.boolean().default(true).describe('Store original vectors on disk'),
  quantization: z.enum(['scalar', 'none']).default('scalar').describe('Quantization kept in RAM')
});

export type CollectionSpec = z.input<typeof collectionSpecSchema>;

/**
 * Collection summary as reported by the vector index
 */
export const collectionInfoSchema = z.object({
  name: z.string(),
  status: z.string(),
  dimension: z.number().int().positive().nullable().describe('Null for named/multi-vector configs'),
  distance: z.string().nullable(),
  pointsCount: z.number().int().nonnegative()
});

export type CollectionInfo = z.infer<typeof collectionInfoSchema>;
