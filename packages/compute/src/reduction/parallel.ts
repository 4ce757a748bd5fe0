// ---------------------------------------------------------------------------
// @semiring-kit/compute — Parallel (fork/join) Reduction
// ---------------------------------------------------------------------------
// The input is cut into contiguous chunks of at most `chunkSize` elements,
// and never fewer chunks than `parallelism` allows. Each chunk fold is a
// task on a slot pool of `min(parallelism, chunks)` slots; surplus chunks
// queue for a free slot. Tasks share nothing but the immutable structure
// and read-only input. Promise.all is the join barrier, after which
// partials combine strictly in chunk order.
// ---------------------------------------------------------------------------

import { isMonoid, type Monoid, type Semigroup } from '@semiring-kit/algebra';
import { createLogger, parseReduceOptions, type ReduceOptions } from '@semiring-kit/config';
import { EmptyReductionError } from '../errors.js';
import { createSlotPool, fixedChunks, resolveParallelism, runInSlot } from '../workers/worker-pool.js';
import { foldRange, reduceRange } from './reduce.js';

const log = createLogger('reduce-parallel');

/**
 * Reduce `elements` as concurrent chunk tasks joined in order.
 *
 * Accepts a Monoid (empty input resolves to `empty`) or a bare Semigroup
 * (empty input rejects with EmptyReductionError). The strategy option
 * selects how each chunk is folded internally.
 */
export async function reduceParallel<T>(
  structure: Semigroup<T> | Monoid<T>,
  elements: readonly T[],
  options: ReduceOptions = {},
): Promise<T> {
  const resolved = parseReduceOptions(options);
  const parallelism = resolveParallelism(resolved.parallelism);

  if (elements.length === 0) {
    if (isMonoid(structure)) return structure.empty;
    throw new EmptyReductionError('parallel');
  }

  const chunkSize = Math.min(resolved.chunkSize, Math.ceil(elements.length / parallelism));
  const chunks = fixedChunks(elements.length, chunkSize);
  const pool = createSlotPool(Math.min(parallelism, chunks.length));
  log.debug('fork', { length: elements.length, chunkSize, chunks: chunks.length, slots: pool.size });

  const partials = await Promise.all(
    chunks.map((c) =>
      runInSlot(pool, () => reduceRange(structure, elements, c.offset, c.offset + c.length, resolved)),
    ),
  );

  log.debug('join', { partials: partials.length, peakBusy: pool.peakBusy });
  return foldRange(structure, partials, 0, partials.length);
}
