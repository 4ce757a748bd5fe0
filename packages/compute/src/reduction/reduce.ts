// ---------------------------------------------------------------------------
// @semiring-kit/compute — Reduction Engine
// ---------------------------------------------------------------------------
// Folds a sequence under a Semigroup or Monoid. Associativity means every
// grouping gives the left fold's value, so the engine may pick any shape:
//
//   sequential  ((((a·b)·c)·d)·e)
//   tree        ((a·b)·(c·(d·e)))       balanced, depth ⌈log₂ n⌉
//   chunked     (fold c₀)·(fold c₁)·…   contiguous chunks, partials in order
//
// Left-to-right order is kept in every shape; commutativity is never assumed.
// ---------------------------------------------------------------------------

import type { Monoid, Semigroup } from '@semiring-kit/algebra';
import {
  createLogger,
  parseReduceOptions,
  type ReduceOptions,
  type ReduceStrategy,
  type ResolvedReduceOptions,
} from '@semiring-kit/config';
import { EmptyReductionError } from '../errors.js';
import { fixedChunks } from '../workers/worker-pool.js';

const log = createLogger('reduce');

// ---------------------------------------------------------------------------
// Range folds (non-empty ranges only)
// ---------------------------------------------------------------------------

/** Left fold of `xs[lo, hi)`. Requires `hi > lo`. */
export function foldRange<T>(s: Semigroup<T>, xs: readonly T[], lo: number, hi: number): T {
  let acc = xs[lo];
  for (let i = lo + 1; i < hi; i++) {
    acc = s.combine(acc, xs[i]);
  }
  return acc;
}

/** Balanced pairwise fold of `xs[lo, hi)`. Requires `hi > lo`. */
export function treeRange<T>(s: Semigroup<T>, xs: readonly T[], lo: number, hi: number): T {
  const length = hi - lo;
  if (length === 1) return xs[lo];
  if (length === 2) return s.combine(xs[lo], xs[lo + 1]);
  const mid = lo + (length >>> 1);
  return s.combine(treeRange(s, xs, lo, mid), treeRange(s, xs, mid, hi));
}

/** Chunked fold of `xs[lo, hi)`: each chunk left-folded, partials left-folded. */
export function chunkedRange<T>(
  s: Semigroup<T>,
  xs: readonly T[],
  lo: number,
  hi: number,
  chunkSize: number,
): T {
  const partials = fixedChunks(hi - lo, chunkSize).map((c) =>
    foldRange(s, xs, lo + c.offset, lo + c.offset + c.length),
  );
  return foldRange(s, partials, 0, partials.length);
}

/** Fold a non-empty range with the given strategy. */
export function reduceRange<T>(
  s: Semigroup<T>,
  xs: readonly T[],
  lo: number,
  hi: number,
  options: Pick<ResolvedReduceOptions, 'strategy' | 'chunkSize'>,
): T {
  switch (options.strategy) {
    case 'sequential':
      return foldRange(s, xs, lo, hi);
    case 'tree':
      return treeRange(s, xs, lo, hi);
    case 'chunked':
      return chunkedRange(s, xs, lo, hi, options.chunkSize);
  }
}

// ---------------------------------------------------------------------------
// Public entry points
// ---------------------------------------------------------------------------

/**
 * Combine all `elements` under `monoid`. Empty input yields `monoid.empty`.
 *
 * @example
 * reduce(sumMonoid, [1, 2, 3, 4, 5])                          // 15
 * reduce(sumMonoid, [1, 2, 3, 4, 5], { strategy: 'chunked', chunkSize: 2 }) // 15
 */
export function reduce<T>(monoid: Monoid<T>, elements: readonly T[], options: ReduceOptions = {}): T {
  const resolved = parseReduceOptions(options);
  log.debug('reduce', { strategy: resolved.strategy, length: elements.length });
  if (elements.length === 0) return monoid.empty;
  return reduceRange(monoid, elements, 0, elements.length, resolved);
}

/**
 * Combine a non-empty sequence under a bare semigroup.
 * Throws EmptyReductionError on empty input.
 */
export function reduceSemigroup<T>(
  semigroup: Semigroup<T>,
  elements: readonly T[],
  options: ReduceOptions = {},
): T {
  const resolved = parseReduceOptions(options);
  log.debug('reduceSemigroup', { strategy: resolved.strategy, length: elements.length });
  if (elements.length === 0) throw new EmptyReductionError(resolved.strategy);
  return reduceRange(semigroup, elements, 0, elements.length, resolved);
}

/** Map each element into the monoid, then reduce. */
export function foldMap<A, T>(
  monoid: Monoid<T>,
  elements: readonly A[],
  f: (a: A, index: number) => T,
  options: ReduceOptions = {},
): T {
  return reduce(monoid, elements.map(f), options);
}

/**
 * Fold with pre-resolved options, skipping validation and logging.
 * For engine-internal hot loops such as matrix dot products.
 */
export function reduceUnchecked<T>(
  monoid: Monoid<T>,
  elements: readonly T[],
  strategy: ReduceStrategy,
  chunkSize = 1024,
): T {
  if (elements.length === 0) return monoid.empty;
  return reduceRange(monoid, elements, 0, elements.length, { strategy, chunkSize });
}
