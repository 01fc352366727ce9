import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
  ConfigurationError,
  hashBytes,
  pointIdFor,
  SharpImagePreprocessor,
  ValidationError,
  type Collaborators,
  type IngestOptions
} from '@imagefind/core';
import {
  BLUE,
  FakeEmbeddingService,
  GREEN,
  InMemoryBlobStore,
  InMemoryVectorIndex,
  RED,
  createTempDir,
  writeFileDeep,
  writeImage
} from '@imagefind/test-utils';
import { IngestPipeline } from '../src/worker/ingest-pipeline';

const COLLECTION = 'test-images';

describe('IngestPipeline', () => {
  let temp: { dir: string; cleanup: () => Promise<void> };
  let root: string;
  let images: Record<'red' | 'green' | 'blue', { path: string; bytes: Buffer }>;
  let embedder: FakeEmbeddingService;
  let blobStore: InMemoryBlobStore;
  let vectorIndex: InMemoryVectorIndex;

  const collaborators = (): Collaborators => ({
    embedder,
    preprocessor: new SharpImagePreprocessor(),
    blobStore,
    vectorIndex
  });

  const pipeline = (options: Partial<IngestOptions> = {}) =>
    new IngestPipeline(collaborators(), {
      collectionName: COLLECTION,
      batchSize: 2,
      ioConcurrency: 2,
      computeConcurrency: 1,
      networkConcurrency: 2,
      ...options
    });

  const points = () => vectorIndex.collections.get(COLLECTION)?.points ?? new Map();

  beforeEach(async () => {
    temp = await createTempDir();
    root = path.join(temp.dir, 'library');
    images = {
      red: await writeImage(root, 'red.png', { color: RED }),
      green: await writeImage(root, 'nested/green.png', { color: GREEN }),
      blue: await writeImage(root, 'nested/deep/blue.png', { color: BLUE })
    };
    embedder = new FakeEmbeddingService();
    blobStore = new InMemoryBlobStore();
    vectorIndex = new InMemoryVectorIndex();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('should store, embed and index every image', async () => {
    const report = await pipeline().run(root);

    expect(report).toMatchObject({ discovered: 3, skipped: 0, healed: 0, indexed: 3, failed: 0, failures: [] });

    const keys = Object.values(images).map(image => `${hashBytes(image.bytes)}.png`);
    expect(await blobStore.list()).toEqual([...keys].sort());
    expect(blobStore.objects.get(`${hashBytes(images.red.bytes)}.png`)).toEqual(images.red.bytes);

    const greenHash = hashBytes(images.green.bytes);
    const green = points().get(pointIdFor(greenHash));
    expect(green?.payload).toEqual({
      hash: greenHash,
      path: 'nested/green.png',
      url: `memory://test-bucket/${greenHash}.png`
    });
    expect(green?.vector).toHaveLength(3);
    expect(points().size).toBe(3);
  });

  it('should create the collection sized for the model', async () => {
    await pipeline().run(root);

    expect(await vectorIndex.getCollectionInfo(COLLECTION)).toMatchObject({ dimension: 3, distance: 'Cosine' });
  });

  it('should skip everything on a second run', async () => {
    await pipeline().run(root);
    const upserts = vectorIndex.upsertRequests.length;

    const report = await pipeline().run(root);

    expect(report).toMatchObject({ discovered: 3, skipped: 3, indexed: 0, failed: 0 });
    expect(blobStore.puts).toHaveLength(3);
    expect(embedder.imagesEmbedded).toBe(3);
    expect(vectorIndex.upsertRequests).toHaveLength(upserts);
  });

  it('should not embed images whose blob is already stored', async () => {
    for (const image of Object.values(images)) {
      blobStore.objects.set(`${hashBytes(image.bytes)}.png`, image.bytes);
    }

    const report = await pipeline().run(root);

    expect(report).toMatchObject({ skipped: 3, indexed: 0, failed: 0 });
    expect(embedder.calls).toBe(0);
    expect(blobStore.puts).toHaveLength(0);
  });

  it('should index duplicate content only once', async () => {
    await writeFileDeep(path.join(root, 'copies', 'red-again.png'), images.red.bytes);

    const report = await pipeline().run(root);

    expect(report).toMatchObject({ discovered: 4, skipped: 1, indexed: 3, failed: 0 });
    expect(points().size).toBe(3);
    expect(blobStore.puts).toHaveLength(3);
  });

  it('should refuse a collection with another dimension', async () => {
    await vectorIndex.createCollection({ name: COLLECTION, dimension: 5 });

    await expect(pipeline().run(root)).rejects.toThrow(ConfigurationError);
    expect(blobStore.puts).toHaveLength(0);
  });

  it('should reuse a matching collection', async () => {
    await vectorIndex.createCollection({ name: COLLECTION, dimension: 3 });

    const report = await pipeline().run(root);
    expect(report.indexed).toBe(3);
  });

  it('should fail the whole batch when vectors do not line up', async () => {
    embedder = new FakeEmbeddingService({ dropLast: true });

    const report = await pipeline().run(root);

    expect(report).toMatchObject({ indexed: 0, failed: 3 });
    expect(report.failures.every(failure => failure.stage === 'embed' && failure.code === 'COLLABORATOR_ERROR')).toBe(
      true
    );
    expect(blobStore.puts).toHaveLength(0);
    expect(points().size).toBe(0);
  });

  it('should isolate a rejected inference batch', async () => {
    embedder = new FakeEmbeddingService({ failAbove: 1 });

    const report = await pipeline().run(root);

    expect(report).toMatchObject({ indexed: 1, failed: 2 });
    expect(report.failures.map(failure => failure.message)).toEqual(['batch of 2 rejected', 'batch of 2 rejected']);
    expect(points().size).toBe(1);
  });

  it('should isolate a failed upload', async () => {
    const redHash = hashBytes(images.red.bytes);
    blobStore.failingKeys.add(`${redHash}.png`);

    const report = await pipeline().run(root);

    expect(report).toMatchObject({ indexed: 2, failed: 1 });
    expect(report.failures).toEqual([
      { path: images.red.path, stage: 'upload', message: `upload of ${redHash}.png refused` }
    ]);
    expect(points().has(pointIdFor(redHash))).toBe(false);
    expect(points().size).toBe(2);
  });

  it('should fail a duplicate along with the copy that went through', async () => {
    const copy = path.join(root, 'copies', 'red-again.png');
    await writeFileDeep(copy, images.red.bytes);
    const key = `${hashBytes(images.red.bytes)}.png`;
    blobStore.failingKeys.add(key);

    const report = await pipeline().run(root);

    expect(report).toMatchObject({ discovered: 4, skipped: 0, indexed: 2, failed: 2 });
    expect(report.failures.map(failure => failure.path).sort()).toEqual([copy, images.red.path].sort());
    expect(report.failures.every(failure => failure.stage === 'upload')).toBe(true);

    const [first, duplicate] = report.failures;
    expect(first.message).toBe(`upload of ${key} refused`);
    expect(duplicate.message).toBe(`Same content as ${first.path}, which failed: upload of ${key} refused`);
    expect(blobStore.puts.filter(put => put === key)).toHaveLength(1);
  });

  it('should record undecodable files and carry on', async () => {
    const broken = await writeFileDeep(path.join(root, 'broken.png'), Buffer.from('not a png'));

    const report = await pipeline().run(root);

    expect(report).toMatchObject({ discovered: 4, indexed: 3, failed: 1 });
    expect(report.failures[0]).toMatchObject({ path: broken, stage: 'scan', code: 'DECODE_ERROR' });
  });

  it('should heal stored images missing from the index when verifying', async () => {
    vectorIndex.failUpserts = true;
    const failed = await pipeline().run(root);
    expect(failed).toMatchObject({ indexed: 0, failed: 3 });
    expect(failed.failures.every(failure => failure.stage === 'index')).toBe(true);
    expect(blobStore.puts).toHaveLength(3);

    vectorIndex.failUpserts = false;
    const unverified = await pipeline().run(root);
    expect(unverified).toMatchObject({ skipped: 3, healed: 0, indexed: 0 });
    expect(points().size).toBe(0);

    const verified = await pipeline({ verifyIndex: true }).run(root);
    expect(verified).toMatchObject({ skipped: 0, healed: 3, indexed: 0, failed: 0 });
    expect(points().size).toBe(3);
    expect(blobStore.puts).toHaveLength(3);
  });

  it('should split flushes into upsert chunks', async () => {
    await pipeline({ batchSize: 4, upsertChunkSize: 2 }).run(root);

    expect(vectorIndex.upsertRequests).toEqual([2, 1]);
    expect(embedder.batchSizes).toEqual([3]);
  });

  it('should reject invalid options', () => {
    expect(() => pipeline({ collectionName: '' })).toThrow(ValidationError);
    expect(() => pipeline({ batchSize: 0 })).toThrow(ValidationError);
  });

  it('should reject a file as input', async () => {
    await expect(pipeline().run(images.red.path)).rejects.toThrow(ValidationError);
  });

  it('should handle an empty directory', async () => {
    const empty = path.join(temp.dir, 'empty');
    await fs.mkdir(empty);

    const report = await pipeline().run(empty);

    expect(report).toMatchObject({ discovered: 0, indexed: 0, failed: 0 });
  });
});
