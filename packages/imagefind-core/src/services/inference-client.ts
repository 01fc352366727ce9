import axios, { AxiosInstance } from 'axios';
import { INFERENCE_MAX_BATCH_SIZE } from '../constants/limits';
import { CollaboratorError, ConfigurationError } from '../errors';
import { createLogger } from '../logger';
import {
  embedResponseSchema,
  modelInfoSchema,
  type ChannelOrder,
  type EmbedRequest,
  type ModelInfo
} from '../schemas/inference.schema';
import type { EmbeddingService, EmbeddingVector, PreparedImage } from '../types/collaborator.types';
import { createBatches } from '../utils/concurrency.utils';

const logger = createLogger('inference-client');

export type InferenceClientOptions = {
  maxBatchSize?: number;
};

/**
 * Client for the image embedding server.
 * GET /v1/model describes the model once; POST /v1/embed embeds a batch of
 * letterboxed HWC uint8 tensors and answers one vector per input, in order.
 */
export class InferenceClient implements EmbeddingService {
  readonly model: string;
  readonly targetSize: number;
  readonly outputSize: number;
  readonly channelOrder: ChannelOrder;
  private readonly maxBatchSize: number;

  private constructor(
    private readonly http: AxiosInstance,
    info: ModelInfo,
    options: InferenceClientOptions
  ) {
    this.model = info.model;
    this.targetSize = info.target_size;
    this.outputSize = info.output_size;
    this.channelOrder = info.channel_order;
    this.maxBatchSize = options.maxBatchSize ?? INFERENCE_MAX_BATCH_SIZE;
  }

  /**
   * Query the model description and build a client around it
   */
  static async connect(http: AxiosInstance, options: InferenceClientOptions = {}): Promise<InferenceClient> {
    let body: unknown;
    try {
      const response = await http.get('/v1/model');
      body = response.data;
    } catch (error) {
      throw new ConfigurationError(
        'Inference server unreachable',
        { baseURL: http.defaults.baseURL, ...describeAxiosError(error) },
        error
      );
    }

    const parsed = modelInfoSchema.safeParse(body);
    if (!parsed.success) {
      throw new ConfigurationError('Inference server returned an invalid model description', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
    }

    logger.info({
      model: parsed.data.model,
      targetSize: parsed.data.target_size,
      outputSize: parsed.data.output_size,
      channelOrder: parsed.data.channel_order
    }, 'Inference client initialized');

    return new InferenceClient(http, parsed.data, options);
  }

  async predict(image: PreparedImage): Promise<EmbeddingVector> {
    const [vector] = await this.predictBatch([image]);
    return vector;
  }

  /**
   * Embed images, splitting into requests of at most maxBatchSize
   */
  async predictBatch(images: readonly PreparedImage[]): Promise<EmbeddingVector[]> {
    if (images.length === 0) {
      return [];
    }

    const batches = createBatches(images, this.maxBatchSize);
    const vectors: EmbeddingVector[] = [];

    for (let i = 0; i < batches.length; i++) {
      logger.debug({ batchIndex: i, batchSize: batches[i].length }, 'Processing batch');
      vectors.push(...(await this.embedBatch(batches[i])));
    }

    return vectors;
  }

  /**
   * Embed a single request-sized batch
   */
  private async embedBatch(images: readonly PreparedImage[]): Promise<EmbeddingVector[]> {
    const request: EmbedRequest = { inputs: images.map(image => this.toTensor(image)) };

    let body: unknown;
    try {
      const response = await this.http.post('/v1/embed', request);
      body = response.data;
    } catch (error) {
      const details = describeAxiosError(error);
      logger.error({ batchSize: images.length, ...details }, 'Embedding API error');
      throw new CollaboratorError('inference', 'Embedding request failed', { batchSize: images.length, ...details }, error);
    }

    const parsed = embedResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorError('inference', 'Malformed embedding response', {
        issues: parsed.error.issues.slice(0, 5).map(issue => issue.message)
      });
    }

    const { embeddings } = parsed.data;

    // A short or long answer cannot be attributed to single images
    if (embeddings.length !== images.length) {
      throw new CollaboratorError('inference', 'Embedding count does not match batch size', {
        expected: images.length,
        actual: embeddings.length
      });
    }

    for (const embedding of embeddings) {
      if (embedding.length !== this.outputSize) {
        throw new CollaboratorError('inference', `Expected ${this.outputSize} dimensions, got ${embedding.length}`);
      }
    }

    return embeddings;
  }

  private toTensor(image: PreparedImage): EmbedRequest['inputs'][number] {
    if (image.data.length !== image.width * image.height * 3) {
      throw new CollaboratorError('inference', 'Image buffer does not match its shape', {
        width: image.width,
        height: image.height,
        byteLength: image.data.length
      });
    }

    return {
      shape: [image.height, image.width, 3],
      data: image.data.toString('base64')
    };
  }
}

/**
 * Build the axios instance used to reach the inference server
 */
export function createInferenceHttp(options: { baseURL: string; apiKey?: string; timeoutMs: number }): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    maxBodyLength: Infinity,
    maxContentLength: Infinity,
    headers: {
      'Content-Type': 'application/json',
      ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {})
    }
  });
}

function describeAxiosError(error: unknown): { status?: number; error: string } {
  if (axios.isAxiosError(error)) {
    return error.response ? { status: error.response.status, error: error.message } : { error: error.message };
  }
  return { error: error instanceof Error ? error.message : 'Unknown error' };
}
