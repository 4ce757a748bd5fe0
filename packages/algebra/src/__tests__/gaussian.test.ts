import { describe, test, expect } from 'vitest'
import fc from 'fast-check'
import {
  gaussianMonoid, gaussianOf, gaussianFrom, observe,
  mean, variance, pdf, cdf, erf, gaussianEquals,
} from '../gaussian.js'
import { checkMonoidLaws } from '../laws.js'

const sample = [2, 4, 4, 4, 5, 5, 7, 9]

describe('Gaussian summary', () => {
  test('streaming summary of a known sample', () => {
    const g = gaussianFrom(sample)
    expect(g.n).toBe(8)
    expect(mean(g)).toBeCloseTo(5, 12)
    expect(g.m2).toBeCloseTo(32, 10)
    expect(variance(g)).toBeCloseTo(32 / 7, 10)
  })

  test('merging two halves matches the streaming summary', () => {
    const left = gaussianFrom(sample.slice(0, 4))
    const right = gaussianFrom(sample.slice(4))
    expect(gaussianEquals(gaussianMonoid.combine(left, right), gaussianFrom(sample))).toBe(true)
  })

  test('single observations lift into the monoid', () => {
    const folded = sample.map(gaussianOf).reduce(gaussianMonoid.combine, gaussianMonoid.empty)
    expect(gaussianEquals(folded, gaussianFrom(sample))).toBe(true)
    expect(gaussianEquals(observe(gaussianMonoid.empty, 3), gaussianOf(3))).toBe(true)
  })

  test('empty summary is the identity', () => {
    const g = gaussianFrom(sample)
    expect(gaussianMonoid.empty).toEqual({ n: 0, m1: 0, m2: 0 })
    expect(gaussianMonoid.combine(gaussianMonoid.empty, gaussianMonoid.empty)).toEqual({ n: 0, m1: 0, m2: 0 })
    expect(gaussianEquals(gaussianMonoid.combine(gaussianMonoid.empty, g), g)).toBe(true)
  })

  test('variance needs two observations', () => {
    expect(() => variance(gaussianOf(1))).toThrow(RangeError)
    expect(() => variance(gaussianMonoid.empty)).toThrow(RangeError)
  })

  test('density at the mean', () => {
    // mean 2, sample variance 2
    const g = gaussianFrom([1, 3])
    expect(pdf(g, 2)).toBeCloseTo(1 / Math.sqrt(4 * Math.PI), 12)
  })

  test('monoid laws over generated samples', () => {
    const arb = fc.array(fc.integer({ min: -1000, max: 1000 }), { maxLength: 50 }).map(gaussianFrom)
    fc.assert(fc.property(arb, arb, arb, (a, b, c) =>
      checkMonoidLaws(gaussianMonoid, a, b, c, gaussianEquals).holds,
    ))
  })

  test('any chunking of a sample gives the streaming summary', () => {
    fc.assert(fc.property(
      fc.array(fc.integer({ min: -1000, max: 1000 }), { maxLength: 200 }),
      fc.integer({ min: 1, max: 16 }),
      (xs, size) => {
        const partials = []
        for (let i = 0; i < xs.length; i += size) partials.push(gaussianFrom(xs.slice(i, i + size)))
        const merged = partials.reduce(gaussianMonoid.combine, gaussianMonoid.empty)
        return gaussianEquals(merged, gaussianFrom(xs))
      },
    ))
  })
})

describe('normal cdf', () => {
  // mean 2, variance 2
  const g = gaussianFrom([1, 3])
  const sd = Math.SQRT2

  test('is one half at the mean', () => {
    expect(cdf(g, 2)).toBe(0.5)
  })

  test('matches the standard normal one sigma either side', () => {
    expect(cdf(g, 2 + sd)).toBeCloseTo(0.8413447460685429, 10)
    expect(cdf(g, 2 - sd)).toBeCloseTo(0.15865525393145707, 10)
  })

  test('stays accurate in the tails', () => {
    expect(cdf(g, 2 + 3 * sd)).toBeCloseTo(0.9986501019683699, 10)
    expect(cdf(g, 2 + 4 * sd)).toBeCloseTo(0.9999683287581669, 10)
    expect(cdf(g, 2 - 4 * sd)).toBeCloseTo(1 - 0.9999683287581669, 10)
  })

  test('needs a variance', () => {
    expect(() => cdf(gaussianOf(1), 1)).toThrow(RangeError)
  })
})

describe('erf', () => {
  test('known values', () => {
    expect(erf(0)).toBe(0)
    expect(erf(1)).toBeCloseTo(0.8427007929497149, 12)
    expect(erf(3)).toBeCloseTo(0.9999779095030014, 12)
    expect(erf(10)).toBe(1)
    expect(erf(NaN)).toBeNaN()
  })

  test('is odd', () => {
    fc.assert(fc.property(fc.double({ min: -8, max: 8, noNaN: true }), (x) =>
      erf(-x) === -erf(x)))
  })
})
