import { Command } from 'commander';
import { parseNumber, parsePositiveInt } from '@imagefind/core';

export type SearchCommandOptions = {
  collection?: string;
  limit?: number;
  scoreThreshold?: number;
  useUrl: boolean;
  batchSize?: number;
  exact: boolean;
  hnswEf?: number;
  computeConcurrency?: number;
  downloadConcurrency?: number;
};

export interface SearcherHandlers {
  search(input: string, output: string | undefined, options: SearchCommandOptions): Promise<void>;
}

/**
 * imagefind-search command line
 */
export function createSearcherProgram(handlers: SearcherHandlers): Command {
  const program = new Command();

  program
    .name('imagefind-search')
    .description('Find indexed images similar to a probe image or a folder of probe images')
    .argument('<input>', 'probe image, or a directory whose folders become tag groups')
    .argument('[output]', 'where matches are written (defaults to <parent>/output for a directory, the parent folder for a file)')
    .option('-c, --collection <name>', 'collection to search (defaults to COLLECTION_NAME)')
    .option('-l, --limit <number>', 'maximum matches per group', parsePositiveInt)
    .option('-s, --score-threshold <number>', 'minimum similarity score', parseNumber)
    .option('--use-url', 'download matches over HTTP from their public URL', false)
    .option('-b, --batch-size <number>', 'probe images per inference call', parsePositiveInt)
    .option('-e, --exact', 'exhaustive search instead of HNSW', false)
    .option('--hnsw-ef <number>', 'HNSW beam width', parsePositiveInt)
    .option('--compute-concurrency <number>', 'concurrent inference calls', parsePositiveInt)
    .option('--download-concurrency <number>', 'concurrent downloads', parsePositiveInt)
    .action((input: string, output: string | undefined, options: SearchCommandOptions) =>
      handlers.search(input, output, options)
    );

  return program;
}
