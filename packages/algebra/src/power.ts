/**
 * Repeated combination by squaring.
 *
 * Associativity lets x⁹ be computed as ((x²)²)² · x: O(log n) combines
 * instead of n − 1. The same routine powers matrices in the closure engine.
 */

import type { Monoid, Semigroup } from './contracts.js'

/**
 * `x` combined with itself `n` times. `n` must be a positive safe integer.
 */
export function powerSemigroup<T>(s: Semigroup<T>, x: T, n: number): T {
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new RangeError(`Semigroup power must be a positive integer, got ${n}`)
  }
  let result = x
  let base = x
  let m = n - 1
  while (m > 0) {
    if (m % 2 === 1) result = s.combine(result, base)
    m = Math.floor(m / 2)
    if (m > 0) base = s.combine(base, base)
  }
  return result
}

/** Monoid power. `n = 0` yields the identity. */
export function powerMonoid<T>(m: Monoid<T>, x: T, n: number): T {
  if (n === 0) return m.empty
  return powerSemigroup(m, x, n)
}
