import { RECOMMEND_MAX_POSITIVES } from '../constants/limits';
import { ValidationError } from '../errors';
import type { EmbeddingVector } from '../types/collaborator.types';

/**
 * Componentwise arithmetic mean of equal-length vectors
 */
export function meanVector(vectors: readonly EmbeddingVector[]): EmbeddingVector {
  if (vectors.length === 0) {
    throw new ValidationError('Cannot average an empty vector set');
  }

  const dimension = vectors[0].length;
  const sum = new Array<number>(dimension).fill(0);

  for (const vector of vectors) {
    if (vector.length !== dimension) {
      throw new ValidationError('Vector dimensions differ', { expected: dimension, actual: vector.length });
    }
    for (let i = 0; i < dimension; i++) {
      sum[i] += vector[i];
    }
  }

  return sum.map(value => value / vectors.length);
}

/**
 * Chunk width used when `count` vectors exceed `cap`.
 * The +1 keeps the result comfortably under the cap at the cost of coarser
 * chunks just above it.
 */
export function reductionChunkSize(count: number, cap: number = RECOMMEND_MAX_POSITIVES): number {
  return 1 + Math.ceil(count / cap);
}

/**
 * Compress an ordered vector list to at most `cap` representatives.
 * Lists within the cap pass through unchanged; larger ones are split into
 * contiguous chunks that are each replaced by their mean.
 */
export function reduceVectors(
  vectors: readonly EmbeddingVector[],
  cap: number = RECOMMEND_MAX_POSITIVES
): EmbeddingVector[] {
  if (!Number.isInteger(cap) || cap < 1) {
    throw new ValidationError('Reduction cap must be a positive integer', { cap });
  }

  if (vectors.length <= cap) {
    return [...vectors];
  }

  const chunkSize = reductionChunkSize(vectors.length, cap);
  const reduced: EmbeddingVector[] = [];

  for (let i = 0; i < vectors.length; i += chunkSize) {
    reduced.push(meanVector(vectors.slice(i, i + chunkSize)));
  }

  return reduced;
}
