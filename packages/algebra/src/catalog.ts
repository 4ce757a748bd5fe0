/**
 * Structure Catalog
 *
 * Ready-made monoids and semirings over plain JS values. Each is a frozen
 * descriptor; share them freely.
 */

import type { CommutativeMonoid, Monoid, Semigroup, Semiring } from './contracts.js'
import { commutativeMonoid, monoid, semigroup, semiring } from './contracts.js'

// ─── Numeric Monoids ────────────────────────────────────────────────────────

/** Addition, identity 0. */
export const sumMonoid: CommutativeMonoid<number> = commutativeMonoid(0, (a, b) => a + b)

/** Multiplication, identity 1. */
export const productMonoid: CommutativeMonoid<number> = commutativeMonoid(1, (a, b) => a * b)

/** Minimum, identity +Infinity. */
export const minMonoid: CommutativeMonoid<number> = commutativeMonoid(Infinity, (a, b) => Math.min(a, b))

/** Maximum, identity -Infinity. */
export const maxMonoid: CommutativeMonoid<number> = commutativeMonoid(-Infinity, (a, b) => Math.max(a, b))

export const bigintSumMonoid: CommutativeMonoid<bigint> = commutativeMonoid(0n, (a, b) => a + b)

export const bigintProductMonoid: CommutativeMonoid<bigint> = commutativeMonoid(1n, (a, b) => a * b)

// ─── Boolean Monoids ────────────────────────────────────────────────────────

/** Logical or, identity false. */
export const anyMonoid: CommutativeMonoid<boolean> = commutativeMonoid(false, (a, b) => a || b)

/** Logical and, identity true. */
export const allMonoid: CommutativeMonoid<boolean> = commutativeMonoid(true, (a, b) => a && b)

// ─── Bitwise Monoids ────────────────────────────────────────────────────────
// Carrier: unsigned 32-bit integers. `>>> 0` keeps results in [0, 2^32).

export const bitOrMonoid: CommutativeMonoid<number> = commutativeMonoid(0, (a, b) => (a | b) >>> 0)

export const bitAndMonoid: CommutativeMonoid<number> = commutativeMonoid(0xffffffff, (a, b) => (a & b) >>> 0)

export const bitXorMonoid: CommutativeMonoid<number> = commutativeMonoid(0, (a, b) => (a ^ b) >>> 0)

// ─── Sequence Monoids ───────────────────────────────────────────────────────

/** String concatenation. Not commutative. */
export const stringMonoid: Monoid<string> = monoid('', (a, b) => a + b)

/** Array concatenation. Not commutative. */
export function arrayMonoid<T>(): Monoid<readonly T[]> {
  return monoid<readonly T[]>([], (a, b) => [...a, ...b])
}

// ─── Identity-less Semigroups ───────────────────────────────────────────────

/** Keeps the left operand. */
export function firstSemigroup<T>(): Semigroup<T> {
  return semigroup<T>((a) => a)
}

/** Keeps the right operand. */
export function lastSemigroup<T>(): Semigroup<T> {
  return semigroup<T>((_a, b) => b)
}

// ─── Semirings ──────────────────────────────────────────────────────────────

/**
 * Tropical (min, +). 0 = +Infinity, 1 = 0.
 * All-pairs shortest paths.
 */
export const tropicalSemiring: Semiring<number> = semiring({
  additive: minMonoid,
  multiplicative: sumMonoid,
  idempotent: true,
})

/**
 * Arctic (max, +). 0 = -Infinity, 1 = 0.
 * Longest (critical) paths on acyclic relations.
 */
export const maxPlusSemiring: Semiring<number> = semiring({
  additive: maxMonoid,
  multiplicative: sumMonoid,
  idempotent: true,
})

/** Reachability (or, and). 0 = false, 1 = true. */
export const booleanSemiring: Semiring<boolean> = semiring({
  additive: anyMonoid,
  multiplicative: allMonoid,
  idempotent: true,
})

/** Path counting (+, ×). Loses precision past Number.MAX_SAFE_INTEGER. */
export const countingSemiring: Semiring<number> = semiring({
  additive: sumMonoid,
  multiplicative: productMonoid,
})

/** Exact path counting over bigint. */
export const bigintCountingSemiring: Semiring<bigint> = semiring({
  additive: bigintSumMonoid,
  multiplicative: bigintProductMonoid,
})

/**
 * Bottleneck (max, min). 0 = -Infinity, 1 = +Infinity.
 * Widest paths: the best achievable minimum capacity along a route.
 */
export const bottleneckSemiring: Semiring<number> = semiring({
  additive: maxMonoid,
  multiplicative: minMonoid,
  idempotent: true,
})
