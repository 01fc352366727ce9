/**
 * Outcome of one unit of work in a bounded pool
 */
export type Settled<T, R> =
  | { status: 'fulfilled'; item: T; value: R }
  | { status: 'rejected'; item: T; reason: Error };

export type IngestStage = 'scan' | 'embed' | 'upload' | 'index';

export type QueryStage = 'embed' | 'recommend' | 'download';

export type ItemFailure<S extends string = string> = {
  path: string;
  stage: S;
  message: string;
  code?: string;
};

export type IngestReport = {
  discovered: number;
  skipped: number;
  healed: number;
  indexed: number;
  failed: number;
  failures: ItemFailure<IngestStage>[];
  durationMs: number;
};

/**
 * Probe images searched together
 */
export type TagGroup = {
  tag: string;
  files: string[];
};

export type GroupReport = {
  tag: string;
  outputDir: string;
  probes: number;
  vectors: number;
  matches: number;
  downloaded: number;
  failed: number;
  failures: ItemFailure<QueryStage>[];
};

export type QueryReport = {
  outputDir: string;
  groups: GroupReport[];
  durationMs: number;
};
