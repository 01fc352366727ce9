import {
  createCollaborators,
  createLogger,
  createVectorIndex,
  loadConfig,
  type AppConfig,
  type Collaborators,
  type VectorIndex
} from '@imagefind/core';
import { IngestPipeline } from '../worker/ingest-pipeline';
import type { IndexerHandlers } from './program';

const logger = createLogger('indexer-cli');

/**
 * How the commands reach their collaborators
 */
export interface IndexerFactories {
  loadConfig(): AppConfig;
  /** Connects to every collaborator, the inference server included */
  createCollaborators(config: AppConfig): Promise<Collaborators>;
  createVectorIndex(config: AppConfig): VectorIndex;
}

const defaultFactories: IndexerFactories = {
  loadConfig: () => loadConfig(),
  createCollaborators,
  createVectorIndex
};

/**
 * Command implementations. Collection administration only touches the vector
 * index, so it works while the inference server is down.
 */
export function createIndexerHandlers(factories: IndexerFactories = defaultFactories): IndexerHandlers {
  const startup = async () => {
    const config = factories.loadConfig();
    const collaborators = await factories.createCollaborators(config);
    return { config, collaborators };
  };

  const vectorIndexOnly = () => factories.createVectorIndex(factories.loadConfig());

  return {
    async ingest(inputDir, options) {
      const { config, collaborators } = await startup();

      const pipeline = new IngestPipeline(collaborators, {
        collectionName: options.collection ?? config.COLLECTION_NAME,
        batchSize: options.batchSize,
        upsertChunkSize: options.upsertChunkSize,
        ioConcurrency: options.ioConcurrency,
        computeConcurrency: options.computeConcurrency,
        networkConcurrency: options.networkConcurrency,
        verifyIndex: options.verifyIndex,
        onDisk: options.onDisk,
        quantization: options.quantization ? 'scalar' : 'none'
      });

      const report = await pipeline.run(inputDir);

      if (report.failed > 0) {
        logger.warn({ failed: report.failed, failures: report.failures }, 'Some images were not ingested');
      }
    },

    async info(options) {
      const { config, collaborators } = await startup();
      const collection = options.collection ?? config.COLLECTION_NAME;

      const exists = await collaborators.vectorIndex.collectionExists(collection);
      const info = exists ? await collaborators.vectorIndex.getCollectionInfo(collection) : null;
      const blobs = await collaborators.blobStore.list();

      logger.info({
        collection,
        exists,
        info,
        bucket: config.STORAGE_BUCKET,
        storedObjects: blobs.length,
        model: {
          targetSize: collaborators.embedder.targetSize,
          outputSize: collaborators.embedder.outputSize
        }
      }, 'Index info');
    },

    async collections() {
      const names = await vectorIndexOnly().listCollections();
      logger.info({ collections: names }, 'Collections');
    },

    async drop(collection) {
      await vectorIndexOnly().deleteCollection(collection);
    }
  };
}
