import { describe, it, expect } from 'vitest';
import { meanVector, reduceVectors, reductionChunkSize } from '../src/vector';
import { ValidationError } from '../src/errors';

const ramp = (count: number) => Array.from({ length: count }, (_, i) => [i, 2 * i]);

describe('meanVector', () => {
  it('should average componentwise', () => {
    expect(meanVector([[1, 2], [3, 6]])).toEqual([2, 4]);
  });

  it('should reject an empty set', () => {
    expect(() => meanVector([])).toThrow(ValidationError);
  });

  it('should reject vectors of different dimensions', () => {
    expect(() => meanVector([[1, 2], [1, 2, 3]])).toThrow('Vector dimensions differ');
  });
});

describe('reductionChunkSize', () => {
  it('should add one to the ceiling of count over cap', () => {
    expect(reductionChunkSize(33)).toBe(3);
    expect(reductionChunkSize(65)).toBe(4);
    expect(reductionChunkSize(1024)).toBe(33);
  });
});

describe('reduceVectors', () => {
  it('should pass through lists within the cap', () => {
    const vectors = ramp(32);
    const reduced = reduceVectors(vectors);

    expect(reduced).toEqual(vectors);
    expect(reduced).not.toBe(vectors);
  });

  it('should reduce 65 vectors to 17 chunk means', () => {
    const reduced = reduceVectors(ramp(65));

    expect(reduced).toHaveLength(17);
    expect(reduced[0]).toEqual([1.5, 3]);
    expect(reduced[1]).toEqual([5.5, 11]);
    expect(reduced[16]).toEqual([64, 128]);
  });

  it('should reduce 33 vectors to 11 chunks of 3', () => {
    const reduced = reduceVectors(ramp(33));

    expect(reduced).toHaveLength(11);
    expect(reduced[10]).toEqual([31, 62]);
  });

  it('should never exceed the cap', () => {
    for (const count of [33, 100, 1024, 1025, 5000]) {
      expect(reduceVectors(ramp(count)).length).toBeLessThanOrEqual(32);
    }
  });

  it('should honour a custom cap', () => {
    expect(reduceVectors(ramp(5), 2)).toEqual([[1, 2], [4, 8]]);
  });

  it('should reject a non-positive cap', () => {
    expect(() => reduceVectors(ramp(3), 0)).toThrow(ValidationError);
  });
});
