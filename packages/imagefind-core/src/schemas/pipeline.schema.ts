import { availableParallelism } from 'os';
import { z } from 'zod';
import {
  DOWNLOAD_CONCURRENCY,
  INGEST_BATCH_SIZE,
  QUERY_BATCH_SIZE,
  QUERY_DEFAULT_HNSW_EF,
  QUERY_DEFAULT_LIMIT,
  QUERY_DEFAULT_SCORE_THRESHOLD,
  UPSERT_CHUNK_SIZE
} from '../constants/limits';

const concurrency = (multiplier: number) =>
  z
    .number()
    .int()
    .positive()
    .default(() => Math.max(1, availableParallelism() * multiplier));

/**
 * Ingest pipeline options
 */
export const ingestOptionsSchema = z.object({
  collectionName: z.string().min(1).describe('Target collection'),
  batchSize: z.number().int().positive().default(INGEST_BATCH_SIZE).describe('Images per inference call and points per upsert flush'),
  upsertChunkSize: z.number().int().positive().default(UPSERT_CHUNK_SIZE).describe('Points per upsert request'),
  ioConcurrency: concurrency(2).describe('Hash and decode workers'),
  computeConcurrency: concurrency(1).describe('Concurrent inference calls'),
  networkConcurrency: concurrency(1).describe('Concurrent uploads'),
  verifyIndex: z.boolean().default(false).describe('Re-index stored blobs whose point is missing'),
  onDisk: z.boolean().default(true).describe('Create collection with on-disk vectors'),
  quantization: z.enum(['scalar', 'none']).default('scalar').describe('Create collection with scalar quantization')
});

export type IngestOptions = z.input<typeof ingestOptionsSchema>;
export type ResolvedIngestOptions = z.output<typeof ingestOptionsSchema>;

/**
 * Query pipeline options
 */
export const queryOptionsSchema = z.object({
  collectionName: z.string().min(1).describe('Collection to search'),
  outputDir: z.string().min(1).optional().describe('Where matches are written'),
  limit: z.number().int().positive().default(QUERY_DEFAULT_LIMIT),
  scoreThreshold: z.number().default(QUERY_DEFAULT_SCORE_THRESHOLD),
  exact: z.boolean().default(false),
  hnswEf: z.number().int().positive().default(QUERY_DEFAULT_HNSW_EF),
  batchSize: z.number().int().positive().default(QUERY_BATCH_SIZE),
  computeConcurrency: concurrency(1),
  downloadConcurrency: z.number().int().positive().default(DOWNLOAD_CONCURRENCY),
  source: z.enum(['blob', 'url']).default('blob').describe('Where match bytes are fetched from')
});

export type QueryOptions = z.input<typeof queryOptionsSchema>;
export type ResolvedQueryOptions = z.output<typeof queryOptionsSchema>;
