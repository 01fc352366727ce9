import type { ChannelOrder, EmbeddingService, EmbeddingVector, PreparedImage } from '@imagefind/core';

export interface FakeEmbeddingOptions {
  targetSize?: number;
  channelOrder?: ChannelOrder;
  /** Drop the last vector of every batch, to simulate a misaligned server */
  dropLast?: boolean;
  /** Reject any batch containing more than this many images */
  failAbove?: number;
}

/**
 * Deterministic embedder: the vector is the mean of each channel scaled to 0..1,
 * so identical pixels give identical vectors and pure colours are orthogonal
 */
export class FakeEmbeddingService implements EmbeddingService {
  readonly targetSize: number;
  readonly outputSize = 3;
  readonly channelOrder: ChannelOrder;
  readonly batchSizes: number[] = [];

  constructor(private readonly options: FakeEmbeddingOptions = {}) {
    this.targetSize = options.targetSize ?? 8;
    this.channelOrder = options.channelOrder ?? 'rgb';
  }

  get calls(): number {
    return this.batchSizes.length;
  }

  get imagesEmbedded(): number {
    return this.batchSizes.reduce((total, size) => total + size, 0);
  }

  async predict(image: PreparedImage): Promise<EmbeddingVector> {
    const [vector] = await this.predictBatch([image]);
    return vector;
  }

  async predictBatch(images: readonly PreparedImage[]): Promise<EmbeddingVector[]> {
    this.batchSizes.push(images.length);

    if (this.options.failAbove !== undefined && images.length > this.options.failAbove) {
      throw new Error(`batch of ${images.length} rejected`);
    }

    const vectors = images.map(image => channelMeans(image));
    return this.options.dropLast ? vectors.slice(0, -1) : vectors;
  }
}

export function channelMeans(image: PreparedImage): EmbeddingVector {
  const sums = [0, 0, 0];
  const pixels = image.data.length / 3;

  for (let i = 0; i < image.data.length; i += 3) {
    sums[0] += image.data[i];
    sums[1] += image.data[i + 1];
    sums[2] += image.data[i + 2];
  }

  return sums.map(sum => sum / pixels / 255);
}
