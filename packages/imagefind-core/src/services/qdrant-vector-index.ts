import { QdrantClient } from '@qdrant/js-client-rest';
import { UPSERT_CHUNK_SIZE } from '../constants/limits';
import { CollaboratorError, PayloadError } from '../errors';
import { createLogger } from '../logger';
import { collectionSpecSchema, type CollectionInfo, type CollectionSpec } from '../schemas/collection.schema';
import { imagePayloadSchema, type IndexedPoint, type ScoredImage } from '../schemas/image-payload.schema';
import { recommendQuerySchema, type RecommendQuery } from '../schemas/search.schema';
import type { VectorIndex } from '../types/collaborator.types';
import { createBatches } from '../utils/concurrency.utils';

const logger = createLogger('qdrant-vector-index');

/**
 * Vector index backed by Qdrant's REST API
 */
export class QdrantVectorIndex implements VectorIndex {
  constructor(private readonly client: QdrantClient) {}

  async collectionExists(name: string): Promise<boolean> {
    const { exists } = await this.call('collectionExists', { collection: name }, () =>
      this.client.collectionExists(name)
    );
    return exists;
  }

  async createCollection(spec: CollectionSpec): Promise<void> {
    const { name, dimension, distance, onDisk, quantization } = collectionSpecSchema.parse(spec);

    await this.call('createCollection', { collection: name }, () =>
      this.client.createCollection(name, {
        vectors: { size: dimension, distance, on_disk: onDisk },
        quantization_config:
          quantization === 'scalar' ? { scalar: { type: 'int8', always_ram: true } } : undefined
      })
    );

    logger.info({ collection: name, dimension, distance, onDisk, quantization }, 'Collection created');
  }

  async getCollectionInfo(name: string): Promise<CollectionInfo> {
    const info = await this.call('getCollectionInfo', { collection: name }, () => this.client.getCollection(name));

    // Unnamed vector configs carry size/distance directly
    const vectors = info.config.params.vectors;
    const size = vectors?.size;
    const distance = vectors?.distance;

    return {
      name,
      status: info.status,
      dimension: typeof size === 'number' ? size : null,
      distance: typeof distance === 'string' ? distance : null,
      pointsCount: info.points_count ?? 0
    };
  }

  async listCollections(): Promise<string[]> {
    const { collections } = await this.call('listCollections', {}, () => this.client.getCollections());
    return collections.map(collection => collection.name);
  }

  async deleteCollection(name: string): Promise<void> {
    await this.call('deleteCollection', { collection: name }, () => this.client.deleteCollection(name));
    logger.info({ collection: name }, 'Collection deleted');
  }

  /**
   * Upsert points in sequential chunks, waiting for each to be applied
   */
  async upsert(name: string, points: readonly IndexedPoint[], chunkSize: number = UPSERT_CHUNK_SIZE): Promise<void> {
    for (const chunk of createBatches(points, chunkSize)) {
      await this.call('upsert', { collection: name, points: chunk.length }, () =>
        this.client.upsert(name, {
          wait: true,
          points: chunk.map(point => ({
            id: point.id,
            vector: point.vector,
            payload: { ...point.payload }
          }))
        })
      );
    }
  }

  async recommend(name: string, query: RecommendQuery): Promise<ScoredImage[]> {
    const { positive, limit, scoreThreshold, exact, hnswEf } = recommendQuerySchema.parse(query);

    const results = await this.call('recommend', { collection: name, positives: positive.length, limit }, () =>
      this.client.recommend(name, {
        positive,
        limit,
        score_threshold: scoreThreshold,
        with_payload: true,
        params: { exact, hnsw_ef: hnswEf }
      })
    );

    return results.map(point => {
      const payload = imagePayloadSchema.safeParse(point.payload ?? {});
      if (!payload.success) {
        throw new PayloadError('Indexed point has an invalid payload', {
          pointId: String(point.id),
          issues: payload.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        });
      }
      return { id: String(point.id), score: point.score, payload: payload.data };
    });
  }

  async existingIds(name: string, ids: readonly string[]): Promise<Set<string>> {
    if (ids.length === 0) {
      return new Set();
    }

    const records = await this.call('retrieve', { collection: name, ids: ids.length }, () =>
      this.client.retrieve(name, { ids: [...ids], with_payload: false, with_vector: false })
    );

    return new Set(records.map(record => String(record.id)));
  }

  /**
   * Run a client call, converting failures into CollaboratorError
   */
  private async call<T>(operation: string, context: Record<string, unknown>, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error({ operation, ...context, error: message }, 'Vector index call failed');
      throw new CollaboratorError('vector-index', `${operation} failed: ${message}`, { operation, ...context }, error);
    }
  }
}
