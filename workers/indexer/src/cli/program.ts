import { Command } from 'commander';
import { parsePositiveInt } from '@imagefind/core';

export type IngestCommandOptions = {
  collection?: string;
  batchSize?: number;
  upsertChunkSize?: number;
  ioConcurrency?: number;
  computeConcurrency?: number;
  networkConcurrency?: number;
  verifyIndex: boolean;
  onDisk: boolean;
  quantization: boolean;
};

export type InfoCommandOptions = {
  collection?: string;
};

export interface IndexerHandlers {
  ingest(inputDir: string, options: IngestCommandOptions): Promise<void>;
  info(options: InfoCommandOptions): Promise<void>;
  collections(): Promise<void>;
  drop(collection: string): Promise<void>;
}

/**
 * imagefind-index command line
 */
export function createIndexerProgram(handlers: IndexerHandlers): Command {
  const program = new Command();

  program
    .name('imagefind-index')
    .description('Store, embed and index every image under a directory');

  program
    .command('ingest', { isDefault: true })
    .description('ingest a directory tree of images')
    .argument('<input-dir>', 'directory to scan recursively')
    .option('-c, --collection <name>', 'collection to write to (defaults to COLLECTION_NAME)')
    .option('-b, --batch-size <number>', 'images per inference call and points per upsert flush', parsePositiveInt)
    .option('--upsert-chunk-size <number>', 'points per upsert request', parsePositiveInt)
    .option('--io-concurrency <number>', 'concurrent hash/decode workers', parsePositiveInt)
    .option('--compute-concurrency <number>', 'concurrent inference calls', parsePositiveInt)
    .option('--network-concurrency <number>', 'concurrent uploads', parsePositiveInt)
    .option('--verify-index', 're-index stored images whose point is missing', false)
    .option('--no-on-disk', 'keep vectors in RAM when creating the collection')
    .option('--no-quantization', 'disable scalar quantization when creating the collection')
    .action((inputDir: string, options: IngestCommandOptions) => handlers.ingest(inputDir, options));

  program
    .command('info')
    .description('show collection and blob store statistics')
    .option('-c, --collection <name>', 'collection to describe (defaults to COLLECTION_NAME)')
    .action((options: InfoCommandOptions) => handlers.info(options));

  program
    .command('collections')
    .description('list collections in the vector index')
    .action(() => handlers.collections());

  program
    .command('drop')
    .description('delete a collection and every point in it')
    .argument('<collection>', 'collection to delete')
    .action((collection: string) => handlers.drop(collection));

  return program;
}
