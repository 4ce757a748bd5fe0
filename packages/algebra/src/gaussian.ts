/**
 * Mergeable summary of a 1-D sample: count, mean, and the sum of squared
 * deviations from the mean. Two summaries merge exactly (Chan et al.), so a
 * sample can be summarised in chunks, in any grouping, and still match a
 * single streaming pass.
 */

import type { Monoid } from './contracts.js'
import { monoid } from './contracts.js'

export interface Gaussian {
  /** Sample count. */
  readonly n: number
  /** Mean. */
  readonly m1: number
  /** Sum of squared deviations from the mean. */
  readonly m2: number
}

const EMPTY: Gaussian = Object.freeze({ n: 0, m1: 0, m2: 0 })

/** Summary of a single observation. */
export function gaussianOf(x: number): Gaussian {
  return { n: 1, m1: x, m2: 0 }
}

/** Add one observation (Welford update). */
export function observe(g: Gaussian, x: number): Gaussian {
  const n = g.n + 1
  const m1 = g.m1 + (x - g.m1) / n
  const m2 = g.m2 + (x - g.m1) * (x - m1)
  return { n, m1, m2 }
}

/** Streaming summary of `values`, one observation at a time. */
export function gaussianFrom(values: Iterable<number>): Gaussian {
  let g = EMPTY
  for (const x of values) g = observe(g, x)
  return g
}

function mergeGaussians(a: Gaussian, b: Gaussian): Gaussian {
  const n = a.n + b.n
  if (n === 0) return EMPTY
  const m1 = a.m1 * (a.n / n) + b.m1 * (b.n / n)
  const m2 = a.m2 + b.m2 + (a.m1 - b.m1) ** 2 * (a.n * b.n) / n
  return { n, m1, m2 }
}

/** Merge monoid. Identity: the summary of no observations. */
export const gaussianMonoid: Monoid<Gaussian> = monoid(EMPTY, mergeGaussians)

export function mean(g: Gaussian): number {
  return g.m1
}

/** Sample variance. Needs at least two observations. */
export function variance(g: Gaussian): number {
  if (g.n <= 1) {
    throw new RangeError(`Variance requires more than one observation, got ${g.n}`)
  }
  return g.m2 / (g.n - 1)
}

/** Normal probability density at `x` with this summary's mean and variance. */
export function pdf(g: Gaussian, x: number): number {
  const m = mean(g)
  const v = variance(g)
  return Math.exp(-0.5 * ((x - m) ** 2 / v)) / Math.sqrt(2 * Math.PI * v)
}

/**
 * Error function. Maclaurin series near 0, Laplace continued fraction for
 * erfc in the tails; about 1e-14 absolute error over the real line.
 */
export function erf(x: number): number {
  if (Number.isNaN(x)) return NaN
  if (x < 0) return -erf(-x)
  if (x > 6) return 1
  if (x <= 2.5) {
    // 2/√π · Σ (-1)ⁿ x^(2n+1) / (n! (2n+1))
    let term = x
    let sum = x
    for (let n = 1; n < 100; n++) {
      term *= (-x * x) / n
      const next = term / (2 * n + 1)
      sum += next
      if (Math.abs(next) < 1e-17 * Math.abs(sum)) break
    }
    return (2 / Math.sqrt(Math.PI)) * sum
  }
  // erfc(x) = e^(-x²)/√π · 1/(x + (1/2)/(x + 1/(x + (3/2)/(x + …))))
  let f = x
  for (let k = 60; k >= 1; k--) f = x + k / 2 / f
  return 1 - Math.exp(-x * x) / (Math.sqrt(Math.PI) * f)
}

/** Normal cumulative distribution at `x` with this summary's mean and variance. */
export function cdf(g: Gaussian, x: number): number {
  const sd = Math.sqrt(variance(g))
  return 0.5 * (1 + erf((x - mean(g)) / (sd * Math.SQRT2)))
}

function close(x: number, y: number): boolean {
  return Math.abs(x - y) <= 1e-8 + 1e-5 * Math.abs(y)
}

/** Exact count, moments equal up to floating-point tolerance. */
export function gaussianEquals(a: Gaussian, b: Gaussian): boolean {
  return a.n === b.n && close(a.m1, b.m1) && close(a.m2, b.m2)
}
