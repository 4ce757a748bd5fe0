// ---------------------------------------------------------------------------
// @semiring-kit/compute — Semiring Closure Engine
// ---------------------------------------------------------------------------
// close(R) = R ⊕ R² ⊕ … ⊕ Rⁿ for an n×n relation R over any semiring.
//
//   tropical  (min, +)   all-pairs shortest path lengths
//   boolean   (or, and)  all-pairs reachability
//   counting  (+, ×)     number of paths (exact on acyclic relations)
//
// Strategies:
//
//   floyd-warshall  R[i][j] ← R[i][j] ⊕ (R[i][k] ⊗ R[k][j]) for via k = 0..n-1.
//                   Always exactly n via-iterations.
//   doubling        Exact sum of R¹..Rⁿ by binary splitting:
//                     S(2m) = S(m) ⊕ P(m) ⊗ S(m),  P(2m) = P(m) ⊗ P(m)
//                     S(m+1) = S(m) ⊕ P(m) ⊗ R,    P(m+1) = P(m) ⊗ R
//                   With earlyStop on an idempotent semiring, stops at the
//                   first doubling that leaves S unchanged (a fixpoint).
//
// Neither strategy loops until convergence on its own. On cycles the two
// can disagree: doubling sums walks of exactly 1..n edges, while
// Floyd–Warshall reuses cells it has already updated and so can count
// longer walks. They agree whenever cycles cannot improve a value (acyclic
// relations, non-negative tropical weights, boolean reachability).
// ---------------------------------------------------------------------------

import type { Semiring } from '@semiring-kit/algebra';
import {
  createLogger,
  parseCloseOptions,
  type CloseOptions,
  type ResolvedCloseOptions,
} from '@semiring-kit/config';
import {
  cloneMatrix,
  identityMatrix,
  matAdd,
  matMul,
  matrixEquals,
  squareSize,
  type Matrix,
} from '../matrix/matrix.js';

const log = createLogger('closure');

// ---------------------------------------------------------------------------
// Floyd–Warshall
// ---------------------------------------------------------------------------

/** Triple loop over via-index k. Mutates `work`. */
function floydWarshall<T>(s: Semiring<T>, work: T[][], n: number): void {
  const plus = s.additive;
  const times = s.multiplicative;
  const zero = plus.empty;

  for (let k = 0; k < n; k++) {
    const rowK = work[k];
    for (let i = 0; i < n; i++) {
      const rik = work[i][k];
      // 0 ⊗ x = 0 and r ⊕ 0 = r: the whole row update is a no-op.
      if (s.equals(rik, zero)) continue;
      const rowI = work[i];
      for (let j = 0; j < n; j++) {
        rowI[j] = plus.combine(rowI[j], times.combine(rik, rowK[j]));
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Doubling
// ---------------------------------------------------------------------------

/**
 * Exact R¹ ⊕ … ⊕ Rⁿ for n ≥ 1, walking the bits of n from the most
 * significant: each bit doubles m, a set bit then appends one power.
 *
 * With `stopAtFixpoint` (idempotent ⊕ only), returns S(m) as soon as a
 * doubling leaves it unchanged. S(2m) = S(m) means every walk of length
 * m+1..2m is already absorbed, and by induction so is every longer one,
 * so S(m) = S(n).
 */
function sumOfPowers<T>(s: Semiring<T>, r: T[][], n: number, stopAtFixpoint: boolean): T[][] {
  let sum = r;
  let power = r;
  let m = 1;
  for (let bit = 31 - Math.clz32(n) - 1; bit >= 0; bit--) {
    const doubled = matAdd(s, sum, matMul(s, power, sum));
    if (stopAtFixpoint && matrixEquals(s, doubled, sum)) {
      log.debug('converged', { n, m });
      return sum;
    }
    sum = doubled;
    power = matMul(s, power, power);
    m *= 2;
    if ((n >>> bit) & 1) {
      power = matMul(s, power, r);
      sum = matAdd(s, sum, power);
      m += 1;
    }
  }
  return sum;
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

function runClosure<T>(s: Semiring<T>, work: T[][], n: number, options: ResolvedCloseOptions): T[][] {
  let earlyStop = options.earlyStop;
  if (earlyStop && !s.idempotent) {
    log.warn('earlyStop ignored: additive operation is not idempotent', { n });
    earlyStop = false;
  }
  log.debug('close', { n, strategy: options.strategy, earlyStop });

  if (n === 0) return work;

  switch (options.strategy) {
    case 'floyd-warshall':
      floydWarshall(s, work, n);
      return work;
    case 'doubling':
      return sumOfPowers(s, work, n, earlyStop);
  }
}

// ---------------------------------------------------------------------------
// Public entry points
// ---------------------------------------------------------------------------

/**
 * Semiring closure of a square relation: the ⊕ of every k-step composition
 * for k = 1..n. Returns a new matrix; `relation` is left untouched.
 *
 * Throws DimensionMismatchError for ragged or non-square input, or when
 * `options.size` disagrees with the relation.
 */
export function close<T>(s: Semiring<T>, relation: Matrix<T>, options: CloseOptions = {}): T[][] {
  const resolved = parseCloseOptions(options);
  const n = squareSize(relation, resolved.size);
  return runClosure(s, cloneMatrix(relation), n, resolved);
}

/**
 * Like `close`, but writes the result into `buffer` and returns it.
 * With Floyd–Warshall no second matrix is allocated.
 */
export function closeInPlace<T>(s: Semiring<T>, buffer: T[][], options: CloseOptions = {}): T[][] {
  const resolved = parseCloseOptions(options);
  const n = squareSize(buffer, resolved.size);
  const result = runClosure(s, buffer, n, resolved);
  if (result !== buffer) {
    for (let i = 0; i < n; i++) buffer[i] = result[i];
  }
  return buffer;
}

/**
 * Reflexive closure (Kleene star): I ⊕ close(R), i.e. paths of length ≥ 0.
 * For shortest paths this puts 0 on the diagonal.
 */
export function reflexiveClose<T>(s: Semiring<T>, relation: Matrix<T>, options: CloseOptions = {}): T[][] {
  const closed = close(s, relation, options);
  return matAdd(s, identityMatrix(s, closed.length), closed);
}
