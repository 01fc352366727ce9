import axios, { AxiosInstance } from 'axios';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
  CollaboratorError,
  createBatches,
  createLogger,
  defaultOutputDir,
  describeError,
  DOWNLOAD_TIMEOUT_MS,
  groupProbeImages,
  mapUnordered,
  PayloadError,
  queryOptionsSchema,
  reduceVectors,
  resolveInside,
  storedObjectKey,
  ValidationError,
  type Collaborators,
  type EmbeddingVector,
  type GroupReport,
  type PreparedImage,
  type QueryOptions,
  type QueryReport,
  type QueryStage,
  type ResolvedQueryOptions,
  type ScoredImage,
  type TagGroup
} from '@imagefind/core';

const logger = createLogger('query-pipeline');

type ProbeBatch = {
  index: number;
  files: string[];
};

type PlannedDownload = {
  match: ScoredImage;
  /** Null when the payload path escapes the group folder */
  destination: string | null;
};

const HASH_SUFFIX_LENGTH = 12;

type EmbeddedProbes = {
  vectors: EmbeddingVector[];
  undecodable: { path: string; error: unknown }[];
};

/**
 * Query pipeline
 * group probes → batch embed → reduce → recommend → download
 *
 * Groups are searched one after another and never affect each other.
 */
export class QueryPipeline {
  private readonly options: ResolvedQueryOptions;

  constructor(
    private readonly collaborators: Collaborators,
    options: QueryOptions,
    private readonly http: AxiosInstance = axios.create({ timeout: DOWNLOAD_TIMEOUT_MS })
  ) {
    const parsed = queryOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError('Invalid query options', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
    }
    this.options = parsed.data;
  }

  /**
   * Search with every tag group found in `input`
   */
  async run(input: string): Promise<QueryReport> {
    const startTime = Date.now();
    const groups = await groupProbeImages(input);
    const outputDir = path.resolve(this.options.outputDir ?? (await defaultOutputDir(input)));

    await fs.mkdir(outputDir, { recursive: true });

    logger.info({ input, outputDir, groups: groups.length }, 'Starting query');

    const report: QueryReport = { outputDir, groups: [], durationMs: 0 };

    for (const group of groups) {
      report.groups.push(await this.searchGroup(group, outputDir));
    }

    report.durationMs = Date.now() - startTime;

    logger.info({
      groups: report.groups.length,
      downloaded: report.groups.reduce((total, group) => total + group.downloaded, 0),
      duration: report.durationMs
    }, 'Query complete');

    return report;
  }

  /**
   * Embed, reduce, search and download one group
   */
  async searchGroup(group: TagGroup, outputDir: string): Promise<GroupReport> {
    const groupDir = path.join(outputDir, group.tag);
    const report: GroupReport = {
      tag: group.tag,
      outputDir: groupDir,
      probes: group.files.length,
      vectors: 0,
      matches: 0,
      downloaded: 0,
      failed: 0,
      failures: []
    };

    let stage: QueryStage = 'embed';

    try {
      const vectors = await this.embedProbes(group.files, report);
      if (vectors.length === 0) {
        throw new ValidationError('No probe image could be embedded', { tag: group.tag });
      }

      const positive = reduceVectors(vectors);
      report.vectors = positive.length;

      stage = 'recommend';
      const matches = await this.collaborators.vectorIndex.recommend(this.options.collectionName, {
        positive,
        limit: this.options.limit,
        scoreThreshold: this.options.scoreThreshold,
        exact: this.options.exact,
        hnswEf: this.options.hnswEf
      });
      report.matches = matches.length;

      logger.info({
        tag: group.tag,
        probes: report.probes,
        vectors: report.vectors,
        matches: report.matches
      }, 'Group searched');

      stage = 'download';
      await fs.mkdir(groupDir, { recursive: true });
      await this.downloadMatches(matches, groupDir, report);
    } catch (error) {
      this.recordFailure(report, group.tag, stage, error);
    }

    return report;
  }

  /**
   * Embed probe files in batches, keeping the original file order
   */
  private async embedProbes(files: string[], report: GroupReport): Promise<EmbeddingVector[]> {
    const batches: ProbeBatch[] = createBatches(files, this.options.batchSize).map((batchFiles, index) => ({
      index,
      files: batchFiles
    }));
    const byIndex = new Map<number, EmbeddingVector[]>();

    const embeddings = mapUnordered(batches, this.options.computeConcurrency, batch => this.embedBatch(batch.files));

    for await (const outcome of embeddings) {
      if (outcome.status === 'rejected') {
        for (const file of outcome.item.files) {
          this.recordFailure(report, file, 'embed', outcome.reason);
        }
        continue;
      }

      for (const { path: file, error } of outcome.value.undecodable) {
        this.recordFailure(report, file, 'embed', error);
      }
      byIndex.set(outcome.item.index, outcome.value.vectors);
    }

    return batches.flatMap(batch => byIndex.get(batch.index) ?? []);
  }

  private async embedBatch(files: string[]): Promise<EmbeddedProbes> {
    const { embedder, preprocessor } = this.collaborators;

    const decoded = await Promise.allSettled(
      files.map(async file => preprocessor.prepare(await fs.readFile(file), embedder.targetSize, embedder.channelOrder))
    );

    const images: PreparedImage[] = [];
    const undecodable: EmbeddedProbes['undecodable'] = [];

    for (let i = 0; i < decoded.length; i++) {
      const result = decoded[i];
      if (result.status === 'fulfilled') {
        images.push(result.value);
      } else {
        undecodable.push({ path: files[i], error: result.reason });
      }
    }

    if (images.length === 0) {
      return { vectors: [], undecodable };
    }

    const vectors = await embedder.predictBatch(images);
    if (vectors.length !== images.length) {
      throw new CollaboratorError('inference', 'Embedding count does not match batch size', {
        expected: images.length,
        actual: vectors.length
      });
    }

    return { vectors, undecodable };
  }

  /**
   * Fetch matches with a small bounded pool; each lands on its own path
   */
  private async downloadMatches(matches: ScoredImage[], groupDir: string, report: GroupReport): Promise<void> {
    const planned = this.planDestinations(matches, groupDir);
    const downloads = mapUnordered(planned, this.options.downloadConcurrency, item => this.download(item));

    for await (const outcome of downloads) {
      if (outcome.status === 'rejected') {
        this.recordFailure(report, outcome.item.match.payload.path, 'download', outcome.reason);
        continue;
      }
      report.downloaded++;
      logger.debug({ destination: outcome.value, score: outcome.item.match.score }, 'Match downloaded');
    }
  }

  /**
   * Resolve every destination up front. Payload paths are relative to their own
   * ingest root, so two matches can share one; later ones get the hash prefix
   * appended to their file name.
   */
  private planDestinations(matches: ScoredImage[], groupDir: string): PlannedDownload[] {
    const taken = new Set<string>();

    return matches.map(match => {
      const resolved = resolveInside(groupDir, match.payload.path);
      if (!resolved) {
        return { match, destination: null };
      }

      let destination = resolved;
      const { dir, name, ext } = path.parse(resolved);
      const prefix = match.payload.hash.slice(0, HASH_SUFFIX_LENGTH);
      for (let attempt = 0; taken.has(destination); attempt++) {
        const suffix = attempt === 0 ? prefix : `${prefix}-${attempt}`;
        destination = path.join(dir, `${name}.${suffix}${ext}`);
      }

      if (destination !== resolved) {
        logger.warn({ path: match.payload.path, destination }, 'Matches share a path, renaming');
      }

      taken.add(destination);
      return { match, destination };
    });
  }

  private async download({ match, destination }: PlannedDownload): Promise<string> {
    const { payload } = match;

    if (!destination) {
      throw new PayloadError('Match path escapes the output directory', { pointId: match.id, path: payload.path });
    }

    const bytes =
      this.options.source === 'url'
        ? await this.fetchUrl(payload.url)
        : await this.collaborators.blobStore.get(storedObjectKey(payload.hash, payload.path));

    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.writeFile(destination, bytes);

    return destination;
  }

  private async fetchUrl(url: string): Promise<Buffer> {
    try {
      const response = await this.http.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
      return Buffer.from(response.data);
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new CollaboratorError('http', 'Download failed', { url, status }, error);
    }
  }

  private recordFailure(report: GroupReport, itemPath: string, stage: QueryStage, error: unknown): void {
    const { message, code } = describeError(error);

    report.failed++;
    report.failures.push(code ? { path: itemPath, stage, message, code } : { path: itemPath, stage, message });

    logger.error({ tag: report.tag, path: itemPath, stage, error: message }, 'Query item failed');
  }
}
