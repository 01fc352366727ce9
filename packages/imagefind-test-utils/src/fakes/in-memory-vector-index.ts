import {
  collectionSpecSchema,
  recommendQuerySchema,
  type CollectionInfo,
  type CollectionSpec,
  type IndexedPoint,
  type RecommendQuery,
  type ScoredImage,
  type VectorIndex
} from '@imagefind/core';

type Collection = {
  dimension: number;
  distance: string;
  points: Map<string, IndexedPoint>;
};

/**
 * Exact cosine-similarity index held in memory.
 * Recommend averages the positive examples, like Qdrant's default strategy.
 */
export class InMemoryVectorIndex implements VectorIndex {
  readonly collections = new Map<string, Collection>();
  readonly upsertRequests: number[] = [];
  readonly recommendQueries: RecommendQuery[] = [];
  failUpserts = false;

  async collectionExists(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async createCollection(spec: CollectionSpec): Promise<void> {
    const { name, dimension, distance } = collectionSpecSchema.parse(spec);
    if (this.collections.has(name)) {
      throw new Error(`collection ${name} already exists`);
    }
    this.collections.set(name, { dimension, distance, points: new Map() });
  }

  async getCollectionInfo(name: string): Promise<CollectionInfo> {
    const collection = this.require(name);
    return {
      name,
      status: 'green',
      dimension: collection.dimension,
      distance: collection.distance,
      pointsCount: collection.points.size
    };
  }

  async listCollections(): Promise<string[]> {
    return Array.from(this.collections.keys());
  }

  async deleteCollection(name: string): Promise<void> {
    this.collections.delete(name);
  }

  async upsert(name: string, points: readonly IndexedPoint[], chunkSize = 32): Promise<void> {
    const collection = this.require(name);
    for (let i = 0; i < points.length; i += chunkSize) {
      const chunk = points.slice(i, i + chunkSize);
      this.upsertRequests.push(chunk.length);
      if (this.failUpserts) {
        throw new Error('upsert refused');
      }
      for (const point of chunk) {
        if (point.vector.length !== collection.dimension) {
          throw new Error(`expected ${collection.dimension} dimensions, got ${point.vector.length}`);
        }
        collection.points.set(point.id, point);
      }
    }
  }

  async recommend(name: string, query: RecommendQuery): Promise<ScoredImage[]> {
    const collection = this.require(name);
    const { positive, limit, scoreThreshold } = recommendQuerySchema.parse(query);
    this.recommendQueries.push(query);

    const target = positive[0].map((_, i) => positive.reduce((sum, vector) => sum + vector[i], 0) / positive.length);

    return Array.from(collection.points.values())
      .map(point => ({ id: point.id, score: cosine(target, point.vector), payload: point.payload }))
      .filter(result => scoreThreshold === undefined || result.score >= scoreThreshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  async existingIds(name: string, ids: readonly string[]): Promise<Set<string>> {
    const collection = this.require(name);
    return new Set(ids.filter(id => collection.points.has(id)));
  }

  private require(name: string): Collection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw new Error(`collection ${name} not found`);
    }
    return collection;
  }
}

export function cosine(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  return normA === 0 || normB === 0 ? 0 : dot / Math.sqrt(normA * normB);
}
