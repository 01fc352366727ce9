import type { ChannelOrder } from '../schemas/inference.schema';
import type { CollectionInfo, CollectionSpec } from '../schemas/collection.schema';
import type { IndexedPoint, ScoredImage } from '../schemas/image-payload.schema';
import type { RecommendQuery } from '../schemas/search.schema';

export type EmbeddingVector = number[];

/**
 * Decoded image laid out for the model: HWC, uint8, 3 channels in model order
 */
export interface PreparedImage {
  readonly width: number;
  readonly height: number;
  readonly data: Buffer;
}

/**
 * Batch inference capability
 */
export interface EmbeddingService {
  /** Side of the square input canvas */
  readonly targetSize: number;
  /** Length of every returned vector */
  readonly outputSize: number;
  readonly channelOrder: ChannelOrder;

  predict(image: PreparedImage): Promise<EmbeddingVector>;

  /**
   * Result i belongs to input i
   */
  predictBatch(images: readonly PreparedImage[]): Promise<EmbeddingVector[]>;
}

/**
 * Decodes raw bytes into model input
 */
export interface ImagePreprocessor {
  prepare(bytes: Buffer, targetSize: number, channelOrder: ChannelOrder): Promise<PreparedImage>;
}

/**
 * Key/value object storage
 */
export interface BlobStore {
  exists(key: string): Promise<boolean>;
  put(key: string, bytes: Buffer, contentType?: string): Promise<void>;
  get(key: string): Promise<Buffer>;
  list(prefix?: string): Promise<string[]>;
  publicUrl(key: string): string;
}

/**
 * Vector database holding one point per distinct image
 */
export interface VectorIndex {
  collectionExists(name: string): Promise<boolean>;
  createCollection(spec: CollectionSpec): Promise<void>;
  getCollectionInfo(name: string): Promise<CollectionInfo>;
  listCollections(): Promise<string[]>;
  deleteCollection(name: string): Promise<void>;
  upsert(name: string, points: readonly IndexedPoint[], chunkSize?: number): Promise<void>;
  recommend(name: string, query: RecommendQuery): Promise<ScoredImage[]>;
  /** Subset of `ids` present in the collection */
  existingIds(name: string, ids: readonly string[]): Promise<Set<string>>;
}

/**
 * Handles shared by both pipelines, built once at startup
 */
export interface Collaborators {
  embedder: EmbeddingService;
  preprocessor: ImagePreprocessor;
  blobStore: BlobStore;
  vectorIndex: VectorIndex;
}
