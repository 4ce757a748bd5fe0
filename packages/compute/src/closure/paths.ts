// ---------------------------------------------------------------------------
// @semiring-kit/compute — Path Problems
// ---------------------------------------------------------------------------
// One closure algorithm, several questions, chosen by the semiring.
// ---------------------------------------------------------------------------

import {
  booleanSemiring,
  bottleneckSemiring,
  countingSemiring,
  maxPlusSemiring,
  tropicalSemiring,
} from '@semiring-kit/algebra';
import type { CloseOptions } from '@semiring-kit/config';
import type { Matrix } from '../matrix/matrix.js';
import { close, reflexiveClose } from './close.js';

/**
 * Shortest distance between every pair. `weights[i][j]` is the edge weight,
 * `Infinity` where there is no edge. The diagonal is 0 (the empty path).
 */
export function allPairsShortestPaths(weights: Matrix<number>, options?: CloseOptions): number[][] {
  return reflexiveClose(tropicalSemiring, weights, options);
}

/** `result[i][j]` is true iff j is reachable from i by one or more edges. */
export function reachability(adjacency: Matrix<boolean>, options?: CloseOptions): boolean[][] {
  return close(booleanSemiring, adjacency, options);
}

/**
 * Number of distinct paths of 1..n edges between every pair. On a cyclic
 * relation this counts walks up to the iteration bound, not all walks.
 */
export function countPaths(adjacency: Matrix<number>, options?: CloseOptions): number[][] {
  return close(countingSemiring, adjacency, options);
}

/**
 * Widest path: the largest achievable minimum capacity along a route.
 * Use `-Infinity` for missing edges.
 */
export function widestPaths(capacities: Matrix<number>, options?: CloseOptions): number[][] {
  return close(bottleneckSemiring, capacities, options);
}

/**
 * Longest path lengths on an acyclic relation (critical paths). Use
 * `-Infinity` for missing edges.
 */
export function longestPaths(weights: Matrix<number>, options?: CloseOptions): number[][] {
  return close(maxPlusSemiring, weights, options);
}
