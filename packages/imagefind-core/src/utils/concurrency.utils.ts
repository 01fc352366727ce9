import type { Settled } from '../types/pipeline.types';

type Source<T> = AsyncIterable<T> | Iterable<T>;

type PoolEvent<T, R> =
  | { kind: 'pulled'; next: IteratorResult<T> }
  | { kind: 'settled'; id: number; outcome: Settled<T, R> };

/**
 * Coerce a thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function isAsyncIterable<T>(source: Source<T>): source is AsyncIterable<T> {
  return Symbol.asyncIterator in source;
}

function toIterator<T>(source: Source<T>): AsyncIterator<T> | Iterator<T> {
  if (isAsyncIterable(source)) {
    return source[Symbol.asyncIterator]();
  }
  return source[Symbol.iterator]();
}

/**
 * Bounded worker pool over a (possibly lazy) source.
 *
 * At most `concurrency` calls of `fn` are in flight. Outcomes are yielded in
 * completion order, and the next source item is only pulled once a slot is free
 * and the consumer asked for more, which is what bounds memory between stages.
 * `fn` failures become `rejected` outcomes; they never end the stream.
 */
export async function* mapUnordered<T, R>(
  source: Source<T>,
  concurrency: number,
  fn: (item: T) => Promise<R>
): AsyncGenerator<Settled<T, R>, void, undefined> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const iterator = toIterator(source);
  const inFlight = new Map<number, Promise<PoolEvent<T, R>>>();
  let pull: Promise<PoolEvent<T, R>> | undefined;
  let exhausted = false;
  let nextId = 0;

  const start = (item: T): void => {
    const id = nextId++;
    const task = Promise.resolve()
      .then(() => fn(item))
      .then(
        (value): PoolEvent<T, R> => ({ kind: 'settled', id, outcome: { status: 'fulfilled', item, value } }),
        (error: unknown): PoolEvent<T, R> => ({
          kind: 'settled',
          id,
          outcome: { status: 'rejected', item, reason: toError(error) }
        })
      );
    inFlight.set(id, task);
  };

  try {
    for (;;) {
      if (!exhausted && pull === undefined && inFlight.size < concurrency) {
        pull = Promise.resolve(iterator.next()).then((next): PoolEvent<T, R> => ({ kind: 'pulled', next }));
      }

      if (pull === undefined && inFlight.size === 0) {
        return;
      }

      const racers = Array.from(inFlight.values());
      if (pull !== undefined) racers.push(pull);

      const event = await Promise.race(racers);

      if (event.kind === 'pulled') {
        pull = undefined;
        if (event.next.done) {
          exhausted = true;
        } else {
          start(event.next.value);
        }
        continue;
      }

      inFlight.delete(event.id);
      yield event.outcome;
    }
  } finally {
    if (!exhausted && iterator.return) {
      await iterator.return();
    }
  }
}

/**
 * Group a stream into arrays of `size` in arrival order; the last may be shorter
 */
export async function* batchStream<T>(source: Source<T>, size: number): AsyncGenerator<T[], void, undefined> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`batch size must be a positive integer, got ${size}`);
  }

  let batch: T[] = [];
  for await (const item of source) {
    batch.push(item);
    if (batch.length === size) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) {
    yield batch;
  }
}

/**
 * Split items into batches
 */
export function createBatches<T>(items: readonly T[], batchSize: number): T[][] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batch size must be a positive integer, got ${batchSize}`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}
