import { promises as fs } from 'fs';
import * as path from 'path';
import {
  batchStream,
  CollaboratorError,
  ConfigurationError,
  contentTypeFor,
  createLogger,
  describeError,
  hashFile,
  ingestOptionsSchema,
  listImages,
  mapUnordered,
  pointIdFor,
  storedObjectKey,
  toRelativePosix,
  ValidationError,
  type Collaborators,
  type EmbeddingVector,
  type IndexedPoint,
  type IngestOptions,
  type IngestReport,
  type IngestStage,
  type PreparedImage,
  type ResolvedIngestOptions
} from '@imagefind/core';

const logger = createLogger('ingest-pipeline');

type ScannedImage = {
  path: string;
  relativePath: string;
  hash: string;
  key: string;
  pointId: string;
};

type PendingImage = ScannedImage & {
  kind: 'pending';
  /** Blob already stored; only the point is (re)written */
  blobStored: boolean;
  image: PreparedImage;
};

type ScanResult = (ScannedImage & { kind: 'skipped' }) | PendingImage;

type EmbeddedImage = ScannedImage & {
  blobStored: boolean;
  vector: EmbeddingVector;
};

/** A later file with the same bytes as one already in flight */
type DuplicateCopy = {
  path: string;
  firstPath: string;
};

/**
 * Ingest pipeline
 * discover → hash + dedup check → batch embed → upload → index
 *
 * Every stage is a bounded pool drained in completion order. A failed image is
 * logged and counted; it never stops its siblings.
 */
export class IngestPipeline {
  private readonly options: ResolvedIngestOptions;

  constructor(
    private readonly collaborators: Collaborators,
    options: IngestOptions
  ) {
    const parsed = ingestOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError('Invalid ingest options', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
    }
    this.options = parsed.data;
  }

  /**
   * Create the collection sized for the model, or check an existing one matches it
   */
  async ensureCollection(): Promise<void> {
    const { vectorIndex, embedder } = this.collaborators;
    const { collectionName, onDisk, quantization } = this.options;
    const dimension = embedder.outputSize;

    if (!(await vectorIndex.collectionExists(collectionName))) {
      await vectorIndex.createCollection({
        name: collectionName,
        dimension,
        distance: 'Cosine',
        onDisk,
        quantization
      });
      return;
    }

    const info = await vectorIndex.getCollectionInfo(collectionName);
    if (info.dimension !== null && info.dimension !== dimension) {
      throw new ConfigurationError('Collection dimension does not match model output size', {
        collection: collectionName,
        collectionDimension: info.dimension,
        modelOutputSize: dimension
      });
    }

    logger.info({ collection: collectionName, points: info.pointsCount }, 'Using existing collection');
  }

  /**
   * Ingest every image under `root`
   */
  async run(root: string): Promise<IngestReport> {
    const startTime = Date.now();
    const resolvedRoot = path.resolve(root);

    await this.ensureCollection();

    const files = await listImages(resolvedRoot);
    const report: IngestReport = {
      discovered: files.length,
      skipped: 0,
      healed: 0,
      indexed: 0,
      failed: 0,
      failures: [],
      durationMs: 0
    };

    logger.info({
      root: resolvedRoot,
      discovered: files.length,
      batchSize: this.options.batchSize,
      ioConcurrency: this.options.ioConcurrency,
      computeConcurrency: this.options.computeConcurrency,
      networkConcurrency: this.options.networkConcurrency
    }, 'Starting ingest');

    const copies: DuplicateCopy[] = [];
    const pending = this.scanStage(files, resolvedRoot, report, copies);
    const embedded = this.embedStage(pending, report);
    const uploaded = this.uploadStage(embedded, report);
    await this.indexStage(uploaded, report);
    this.settleCopies(copies, report);

    report.durationMs = Date.now() - startTime;

    logger.info({
      discovered: report.discovered,
      skipped: report.skipped,
      healed: report.healed,
      indexed: report.indexed,
      failed: report.failed,
      duration: report.durationMs
    }, 'Ingest complete');

    return report;
  }

  /**
   * IO-bound: hash, check the blob store, decode what still needs embedding
   */
  private async *scanStage(
    files: string[],
    root: string,
    report: IngestReport,
    copies: DuplicateCopy[]
  ): AsyncGenerator<PendingImage> {
    const firstPaths = new Map<string, string>();
    const scans = mapUnordered(files, this.options.ioConcurrency, file => this.scan(file, root));

    for await (const outcome of scans) {
      if (outcome.status === 'rejected') {
        this.recordFailure(report, outcome.item, 'scan', outcome.reason);
        continue;
      }

      const result = outcome.value;

      if (result.kind === 'skipped') {
        report.skipped++;
        logger.debug({ path: result.path, key: result.key }, 'Already stored, skipping');
        continue;
      }

      // Same bytes twice in one tree: only the first copy goes through
      const firstPath = firstPaths.get(result.key);
      if (firstPath !== undefined) {
        copies.push({ path: result.path, firstPath });
        continue;
      }

      firstPaths.set(result.key, result.path);
      yield result;
    }
  }

  private async scan(file: string, root: string): Promise<ScanResult> {
    const { blobStore, vectorIndex, preprocessor, embedder } = this.collaborators;

    const hash = await hashFile(file);
    const scanned: ScannedImage = {
      path: file,
      relativePath: toRelativePosix(root, file),
      hash,
      key: storedObjectKey(hash, file),
      pointId: pointIdFor(hash)
    };

    const blobStored = await blobStore.exists(scanned.key);

    if (blobStored) {
      const indexed =
        !this.options.verifyIndex ||
        (await vectorIndex.existingIds(this.options.collectionName, [scanned.pointId])).has(scanned.pointId);

      if (indexed) {
        return { kind: 'skipped', ...scanned };
      }

      logger.warn({ path: file, pointId: scanned.pointId }, 'Stored image missing from index, re-indexing');
    }

    const bytes = await fs.readFile(file);
    const image = await preprocessor.prepare(bytes, embedder.targetSize, embedder.channelOrder);

    return { kind: 'pending', ...scanned, blobStored, image };
  }

  /**
   * Compute-bound: sub-batches of decoded images, one inference call each
   */
  private async *embedStage(
    pending: AsyncIterable<PendingImage>,
    report: IngestReport
  ): AsyncGenerator<EmbeddedImage> {
    const batches = batchStream(pending, this.options.batchSize);
    const embeddings = mapUnordered(batches, this.options.computeConcurrency, batch => this.embed(batch));

    for await (const outcome of embeddings) {
      if (outcome.status === 'rejected') {
        // Not attributable to one image: the whole batch fails
        for (const item of outcome.item) {
          this.recordFailure(report, item, 'embed', outcome.reason);
        }
        continue;
      }

      yield* outcome.value;
    }
  }

  private async embed(batch: PendingImage[]): Promise<EmbeddedImage[]> {
    const vectors = await this.collaborators.embedder.predictBatch(batch.map(item => item.image));

    if (vectors.length !== batch.length) {
      throw new CollaboratorError('inference', 'Embedding count does not match batch size', {
        expected: batch.length,
        actual: vectors.length
      });
    }

    logger.debug({ batchSize: batch.length }, 'Batch embedded');

    return batch.map((item, i) => ({
      path: item.path,
      relativePath: item.relativePath,
      hash: item.hash,
      key: item.key,
      pointId: item.pointId,
      blobStored: item.blobStored,
      vector: vectors[i]
    }));
  }

  /**
   * Network-bound: store originals under their content key
   */
  private async *uploadStage(
    embedded: AsyncIterable<EmbeddedImage>,
    report: IngestReport
  ): AsyncGenerator<EmbeddedImage> {
    const uploads = mapUnordered(embedded, this.options.networkConcurrency, item => this.upload(item));

    for await (const outcome of uploads) {
      if (outcome.status === 'rejected') {
        this.recordFailure(report, outcome.item, 'upload', outcome.reason);
        continue;
      }
      yield outcome.value;
    }
  }

  private async upload(item: EmbeddedImage): Promise<EmbeddedImage> {
    if (!item.blobStored) {
      const bytes = await fs.readFile(item.path);
      await this.collaborators.blobStore.put(item.key, bytes, contentTypeFor(item.path));
    }
    return item;
  }

  /**
   * Accumulate points and flush them one batch at a time
   */
  private async indexStage(uploaded: AsyncIterable<EmbeddedImage>, report: IngestReport): Promise<void> {
    let buffer: EmbeddedImage[] = [];

    for await (const item of uploaded) {
      buffer.push(item);
      if (buffer.length >= this.options.batchSize) {
        await this.flush(buffer, report);
        buffer = [];
      }
    }

    if (buffer.length > 0) {
      await this.flush(buffer, report);
    }
  }

  private async flush(items: EmbeddedImage[], report: IngestReport): Promise<void> {
    const { vectorIndex, blobStore } = this.collaborators;

    const points: IndexedPoint[] = items.map(item => ({
      id: item.pointId,
      vector: item.vector,
      payload: {
        hash: item.hash,
        path: item.relativePath,
        url: blobStore.publicUrl(item.key)
      }
    }));

    try {
      await vectorIndex.upsert(this.options.collectionName, points, this.options.upsertChunkSize);
    } catch (error) {
      for (const item of items) {
        this.recordFailure(report, item.path, 'index', error);
      }
      return;
    }

    for (const item of items) {
      if (item.blobStored) {
        report.healed++;
      } else {
        report.indexed++;
      }
    }

    logger.info({
      points: points.length,
      indexed: report.indexed,
      remaining: report.discovered - report.indexed - report.healed - report.skipped - report.failed
    }, 'Points upserted');
  }

  /**
   * A copy shares the outcome of the first file with its bytes
   */
  private settleCopies(copies: DuplicateCopy[], report: IngestReport): void {
    const failures = new Map(report.failures.map(failure => [failure.path, failure]));

    for (const copy of copies) {
      const failure = failures.get(copy.firstPath);

      if (!failure) {
        report.skipped++;
        logger.debug({ path: copy.path, firstPath: copy.firstPath }, 'Duplicate of an ingested file, skipping');
        continue;
      }

      const message = `Same content as ${copy.firstPath}, which failed: ${failure.message}`;
      report.failed++;
      report.failures.push({ ...failure, path: copy.path, message });

      logger.error({ path: copy.path, stage: failure.stage, error: message }, 'Image failed');
    }
  }

  private recordFailure(
    report: IngestReport,
    item: string | { path: string },
    stage: IngestStage,
    error: unknown
  ): void {
    const filePath = typeof item === 'string' ? item : item.path;
    const { message, code } = describeError(error);

    report.failed++;
    report.failures.push(code ? { path: filePath, stage, message, code } : { path: filePath, stage, message });

    logger.error({ path: filePath, stage, error: message }, 'Image failed');
  }
}
