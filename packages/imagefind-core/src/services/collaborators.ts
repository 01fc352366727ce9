import { QdrantClient } from '@qdrant/js-client-rest';
import { createClient } from '@supabase/supabase-js';
import { createLogger } from '../logger';
import type { AppConfig } from '../schemas/config.schema';
import type { Collaborators } from '../types/collaborator.types';
import { SharpImagePreprocessor } from './image-preprocessor';
import { InferenceClient, createInferenceHttp } from './inference-client';
import { QdrantVectorIndex } from './qdrant-vector-index';
import { SupabaseBlobStore } from './supabase-blob-store';

const logger = createLogger('collaborators');

/**
 * Vector index handle on its own, for commands that need nothing else
 */
export function createVectorIndex(config: AppConfig): QdrantVectorIndex {
  return new QdrantVectorIndex(
    new QdrantClient({
      url: config.QDRANT_URL,
      apiKey: config.QDRANT_API_KEY,
      timeout: config.QDRANT_TIMEOUT_MS,
      checkCompatibility: false
    })
  );
}

/**
 * Build the shared collaborator handles once at startup
 */
export async function createCollaborators(config: AppConfig): Promise<Collaborators> {
  const supabase = createClient(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY, {
    auth: { persistSession: false, autoRefreshToken: false }
  });

  const embedder = await InferenceClient.connect(
    createInferenceHttp({
      baseURL: config.INFERENCE_URL,
      apiKey: config.INFERENCE_API_KEY,
      timeoutMs: config.INFERENCE_TIMEOUT_MS
    }),
    { maxBatchSize: config.INFERENCE_MAX_BATCH }
  );

  logger.info({
    bucket: config.STORAGE_BUCKET,
    qdrantUrl: config.QDRANT_URL,
    inferenceUrl: config.INFERENCE_URL
  }, 'Collaborators ready');

  return {
    embedder,
    preprocessor: new SharpImagePreprocessor(),
    blobStore: new SupabaseBlobStore(supabase, config.STORAGE_BUCKET),
    vectorIndex: createVectorIndex(config)
  };
}
