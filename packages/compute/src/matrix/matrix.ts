// ---------------------------------------------------------------------------
// @semiring-kit/compute — Semiring Matrices
// ---------------------------------------------------------------------------
// Square relations over a semiring carrier, stored as arrays of rows.
// "Multiplication" uses ⊗ in place of × and ⊕ in place of +; with it, n×n
// matrices form a monoid whose identity has 1 on the diagonal, 0 elsewhere.
// ---------------------------------------------------------------------------

import {
  monoid,
  powerMonoid,
  type Monoid,
  type Semiring,
} from '@semiring-kit/algebra';
import { DimensionMismatchError } from '../errors.js';
import { reduceUnchecked } from '../reduction/reduce.js';

/** Row-major n×n relation. */
export type Matrix<T> = ReadonlyArray<ReadonlyArray<T>>;

/** A directed edge `[from, to]`, optionally weighted (default: one). */
export type Edge<T> = readonly [from: number, to: number, weight?: T];

// ---------------------------------------------------------------------------
// Shape
// ---------------------------------------------------------------------------

/**
 * Side length of a square relation. Throws DimensionMismatchError if any row
 * length differs from the row count, or if `expected` is given and differs.
 */
export function squareSize<T>(relation: Matrix<T>, expected?: number): number {
  const rows = relation.length;
  for (const row of relation) {
    if (row.length !== rows) {
      throw new DimensionMismatchError(rows, row.length, expected);
    }
  }
  if (expected !== undefined && rows !== expected) {
    throw new DimensionMismatchError(rows, rows, expected);
  }
  return rows;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function fill<T>(n: number, cell: (i: number, j: number) => T): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < n; i++) {
    const row: T[] = [];
    for (let j = 0; j < n; j++) row.push(cell(i, j));
    out.push(row);
  }
  return out;
}

/** All cells 0. */
export function zeroMatrix<T>(s: Semiring<T>, n: number): T[][] {
  const z = s.additive.empty;
  return fill(n, () => z);
}

/** 1 on the diagonal, 0 elsewhere. */
export function identityMatrix<T>(s: Semiring<T>, n: number): T[][] {
  const z = s.additive.empty;
  const u = s.multiplicative.empty;
  return fill(n, (i, j) => (i === j ? u : z));
}

/** Shallow copy of every row. Cells are shared, not cloned. */
export function cloneMatrix<T>(m: Matrix<T>): T[][] {
  return m.map((row) => [...row]);
}

/**
 * Build an n×n relation from an edge list. Parallel edges ⊕-combine; a
 * missing weight counts as 1.
 */
export function relationFromEdges<T>(s: Semiring<T>, n: number, edges: Iterable<Edge<T>>): T[][] {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Relation size must be a non-negative integer, got ${n}`);
  }
  const out = zeroMatrix(s, n);
  for (const [from, to, weight] of edges) {
    if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || to < 0 || from >= n || to >= n) {
      throw new RangeError(`Edge ${from} -> ${to} is outside 0..${n - 1}`);
    }
    out[from][to] = s.additive.combine(out[from][to], weight ?? s.multiplicative.empty);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

/** Same shape, and every cell equal under the semiring's equality. */
export function matrixEquals<T>(s: Semiring<T>, a: Matrix<T>, b: Matrix<T>): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    const ra = a[i];
    const rb = b[i];
    if (ra.length !== rb.length) return false;
    for (let j = 0; j < ra.length; j++) {
      if (!s.equals(ra[j], rb[j])) return false;
    }
  }
  return true;
}

// ---------------------------------------------------------------------------
// Arithmetic
// ---------------------------------------------------------------------------

function sameSize<T>(a: Matrix<T>, b: Matrix<T>): number {
  const n = squareSize(a);
  squareSize(b, n);
  return n;
}

/** Cellwise ⊕. */
export function matAdd<T>(s: Semiring<T>, a: Matrix<T>, b: Matrix<T>): T[][] {
  const n = sameSize(a, b);
  return fill(n, (i, j) => s.additive.combine(a[i][j], b[i][j]));
}

/**
 * Semiring matrix product: `C[i][j] = ⊕ₖ A[i][k] ⊗ B[k][j]`.
 * Each dot product is a reduction under the additive monoid.
 */
export function matMul<T>(s: Semiring<T>, a: Matrix<T>, b: Matrix<T>): T[][] {
  const n = sameSize(a, b);
  const times = s.multiplicative;
  const products: T[] = [];
  return fill(n, (i, j) => {
    const row = a[i];
    products.length = 0;
    for (let k = 0; k < n; k++) products.push(times.combine(row[k], b[k][j]));
    return reduceUnchecked(s.additive, products, 'sequential');
  });
}

/** n×n matrices under `matMul`, identity `identityMatrix(s, n)`. */
export function matrixMonoid<T>(s: Semiring<T>, n: number): Monoid<Matrix<T>> {
  return monoid<Matrix<T>>(identityMatrix(s, n), (a, b) => matMul(s, a, b));
}

/** `relation` multiplied by itself `k` times; `k = 0` yields the identity. */
export function matrixPower<T>(s: Semiring<T>, relation: Matrix<T>, k: number): T[][] {
  const n = squareSize(relation);
  return cloneMatrix(powerMonoid(matrixMonoid(s, n), relation, k));
}
