/**
 * System limits and defaults
 */

// Recommend query accepts at most this many positive examples
export const RECOMMEND_MAX_POSITIVES = 32;

// Vector index
export const UPSERT_CHUNK_SIZE = 32;
export const VECTOR_INDEX_TIMEOUT_MS = 60000; // 60 seconds

// Inference
export const INFERENCE_TIMEOUT_MS = 120000; // 2 minutes
export const INFERENCE_MAX_BATCH_SIZE = 32;

// Pipelines
export const INGEST_BATCH_SIZE = 16;
export const QUERY_BATCH_SIZE = 128;
export const DOWNLOAD_CONCURRENCY = 4;
export const DOWNLOAD_TIMEOUT_MS = 60000; // 60 seconds

// Query defaults
export const QUERY_DEFAULT_LIMIT = 100;
export const QUERY_DEFAULT_SCORE_THRESHOLD = 0.5;
export const QUERY_DEFAULT_HNSW_EF = 32;
