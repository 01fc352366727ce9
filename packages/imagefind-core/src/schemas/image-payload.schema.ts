import { z } from 'zod';

/**
 * Content hash - hex-encoded SHA-256 of the raw file bytes
 */
export const contentHashSchema = z
  .string()
  .regex(/^[0-9a-f]{64}$/, 'Expected 64 lowercase hex characters')
  .describe('SHA-256 of file content, hex encoded');

/**
 * Payload stored alongside every indexed image point
 */
export const imagePayloadSchema = z.object({
  hash: contentHashSchema,
  path: z.string().min(1).describe('Path relative to the ingest root, POSIX separators'),
  url: z.string().min(1).describe('Public URL of the stored original')
});

export type ImagePayload = z.infer<typeof imagePayloadSchema>;

/**
 * Point written to the vector index
 */
export const indexedPointSchema = z.object({
  id: z.string().uuid().describe('Name-based UUID derived from the content hash'),
  vector: z.array(z.number()).min(1).describe('Embedding vector'),
  payload: imagePayloadSchema
});

export type IndexedPoint = z.infer<typeof indexedPointSchema>;

/**
 * Point returned by a recommend query
 */
export const scoredImageSchema = z.object({
  id: z.string().describe('Point identifier'),
  score: z.number().describe('Similarity score'),
  payload: imagePayloadSchema
});

export type ScoredImage = z.infer<typeof scoredImageSchema>;
