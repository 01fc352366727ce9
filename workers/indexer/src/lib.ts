// Library exports only - no CLI execution
export { IngestPipeline } from './worker/ingest-pipeline';
export { createIndexerProgram } from './cli/program';
export type { IndexerHandlers, IngestCommandOptions, InfoCommandOptions } from './cli/program';
export { createIndexerHandlers } from './cli/handlers';
export type { IndexerFactories } from './cli/handlers';
