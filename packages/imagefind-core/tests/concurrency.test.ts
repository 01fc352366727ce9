import { describe, it, expect } from 'vitest';
import { batchStream, createBatches, mapUnordered, type Settled } from '../src';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

async function* countTo(limit: number, pulled: number[]) {
  for (let i = 1; i <= limit; i++) {
    pulled.push(i);
    yield i;
  }
}

describe('mapUnordered', () => {
  it('should never run more than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;

    const outcomes = await collect(
      mapUnordered([1, 2, 3, 4, 5, 6, 7, 8], 3, async item => {
        active++;
        peak = Math.max(peak, active);
        await delay(5);
        active--;
        return item * 10;
      })
    );

    expect(peak).toBe(3);
    expect(outcomes).toHaveLength(8);
  });

  it('should yield in completion order', async () => {
    const outcomes = await collect(
      mapUnordered([30, 1, 15], 3, async ms => {
        await delay(ms);
        return ms;
      })
    );

    expect(outcomes.map(outcome => outcome.item)).toEqual([1, 15, 30]);
  });

  it('should turn failures into rejected outcomes without stopping', async () => {
    const outcomes: Settled<number, number>[] = await collect(
      mapUnordered([1, 2, 3], 1, async item => {
        if (item === 2) {
          throw new Error('two');
        }
        return item;
      })
    );

    expect(outcomes).toEqual([
      { status: 'fulfilled', item: 1, value: 1 },
      { status: 'rejected', item: 2, reason: new Error('two') },
      { status: 'fulfilled', item: 3, value: 3 }
    ]);
  });

  it('should wrap non-error rejections', async () => {
    const [outcome] = await collect(mapUnordered([1], 1, () => Promise.reject('plain')));

    expect(outcome.status).toBe('rejected');
    if (outcome.status === 'rejected') {
      expect(outcome.reason.message).toBe('plain');
    }
  });

  it('should pull lazily from an async source', async () => {
    const pulled: number[] = [];
    const pool = mapUnordered(countTo(100, pulled), 2, async item => item);

    const first = await pool.next();
    expect(first.done).toBe(false);
    expect(pulled.length).toBeLessThanOrEqual(3);

    await pool.return();
    expect(pulled.length).toBeLessThanOrEqual(3);
  });

  it('should reject an invalid concurrency', async () => {
    await expect(collect(mapUnordered([1], 0, async item => item))).rejects.toThrow(RangeError);
  });
});

describe('batchStream', () => {
  it('should group items in arrival order with a short tail', async () => {
    const pulled: number[] = [];
    expect(await collect(batchStream(countTo(5, pulled), 2))).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('should yield nothing for an empty source', async () => {
    expect(await collect(batchStream([], 4))).toEqual([]);
  });
});

describe('createBatches', () => {
  it('should split into fixed-size batches', () => {
    expect(createBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('should reject a zero batch size', () => {
    expect(() => createBatches([1], 0)).toThrow(RangeError);
  });
});
