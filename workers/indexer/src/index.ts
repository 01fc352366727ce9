#!/usr/bin/env tsx
import 'dotenv/config';
import { createLogger, describeError } from '@imagefind/core';
import { createIndexerHandlers } from './cli/handlers';
import { createIndexerProgram } from './cli/program';

const logger = createLogger('indexer-main');

const program = createIndexerProgram(createIndexerHandlers());

async function main() {
  await program.parseAsync(process.argv);
}

main().catch(error => {
  logger.error({ error: describeError(error) }, 'Indexer failed');
  process.exit(1);
});
