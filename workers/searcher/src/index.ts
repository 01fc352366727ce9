#!/usr/bin/env tsx
import 'dotenv/config';
import { createCollaborators, createLogger, describeError, loadConfig } from '@imagefind/core';
import { createSearcherProgram } from './cli/program';
import { QueryPipeline } from './worker/query-pipeline';

const logger = createLogger('searcher-main');

const program = createSearcherProgram({
  async search(input, output, options) {
    const config = loadConfig();
    const collaborators = await createCollaborators(config);

    const pipeline = new QueryPipeline(collaborators, {
      collectionName: options.collection ?? config.COLLECTION_NAME,
      outputDir: output,
      limit: options.limit,
      scoreThreshold: options.scoreThreshold,
      exact: options.exact,
      hnswEf: options.hnswEf,
      batchSize: options.batchSize,
      computeConcurrency: options.computeConcurrency,
      downloadConcurrency: options.downloadConcurrency,
      source: options.useUrl ? 'url' : 'blob'
    });

    const report = await pipeline.run(input);

    for (const group of report.groups) {
      if (group.failed > 0) {
        logger.warn({ tag: group.tag, failed: group.failed, failures: group.failures }, 'Group finished with failures');
      }
    }
  }
});

async function main() {
  await program.parseAsync(process.argv);
}

main().catch(error => {
  logger.error({ error: describeError(error) }, 'Searcher failed');
  process.exit(1);
});
