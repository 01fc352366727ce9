// Library exports only - no CLI execution
export { QueryPipeline } from './worker/query-pipeline';
export { createSearcherProgram } from './cli/program';
export type { SearcherHandlers, SearchCommandOptions } from './cli/program';
