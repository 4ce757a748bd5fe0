/**
 * Algebraic Law Checkers
 *
 * Pointwise checks of the laws the contracts promise:
 *   1. Associativity:   combine(combine(a, b), c) ≡ combine(a, combine(b, c))
 *   2. Identity:        combine(empty, a) ≡ a ≡ combine(a, empty)
 *   3. Absorption:      0 ⊗ a ≡ 0 ≡ a ⊗ 0
 *   4. Distributivity:  a ⊗ (b ⊕ c) ≡ (a ⊗ b) ⊕ (a ⊗ c), and from the right
 *
 * Designed for use with fast-check property-based tests. The engines never
 * call these; lawfulness stays a caller obligation.
 */

import type { Monoid, Semigroup, Semiring } from './contracts.js'

export type Equals<T> = (a: T, b: T) => boolean

// ─── Semigroup Laws ─────────────────────────────────────────────────────────

export function checkAssociativity<T>(
  s: Semigroup<T>,
  a: T,
  b: T,
  c: T,
  equals: Equals<T> = Object.is,
): boolean {
  const lhs = s.combine(s.combine(a, b), c)
  const rhs = s.combine(a, s.combine(b, c))
  return equals(lhs, rhs)
}

export function checkCommutativity<T>(
  s: Semigroup<T>,
  a: T,
  b: T,
  equals: Equals<T> = Object.is,
): boolean {
  return equals(s.combine(a, b), s.combine(b, a))
}

export function checkIdempotence<T>(
  s: Semigroup<T>,
  a: T,
  equals: Equals<T> = Object.is,
): boolean {
  return equals(s.combine(a, a), a)
}

// ─── Monoid Laws ────────────────────────────────────────────────────────────

/** combine(empty, a) ≡ a */
export function checkLeftIdentity<T>(
  m: Monoid<T>,
  a: T,
  equals: Equals<T> = Object.is,
): boolean {
  return equals(m.combine(m.empty, a), a)
}

/** combine(a, empty) ≡ a */
export function checkRightIdentity<T>(
  m: Monoid<T>,
  a: T,
  equals: Equals<T> = Object.is,
): boolean {
  return equals(m.combine(a, m.empty), a)
}

// ─── Semiring Laws ──────────────────────────────────────────────────────────

/** 0 ⊗ a ≡ 0 */
export function checkLeftAbsorption<T>(s: Semiring<T>, a: T): boolean {
  const zero = s.additive.empty
  return s.equals(s.multiplicative.combine(zero, a), zero)
}

/** a ⊗ 0 ≡ 0 */
export function checkRightAbsorption<T>(s: Semiring<T>, a: T): boolean {
  const zero = s.additive.empty
  return s.equals(s.multiplicative.combine(a, zero), zero)
}

/** a ⊗ (b ⊕ c) ≡ (a ⊗ b) ⊕ (a ⊗ c) */
export function checkLeftDistributivity<T>(s: Semiring<T>, a: T, b: T, c: T): boolean {
  const { additive: plus, multiplicative: times } = s
  const lhs = times.combine(a, plus.combine(b, c))
  const rhs = plus.combine(times.combine(a, b), times.combine(a, c))
  return s.equals(lhs, rhs)
}

/** (a ⊕ b) ⊗ c ≡ (a ⊗ c) ⊕ (b ⊗ c) */
export function checkRightDistributivity<T>(s: Semiring<T>, a: T, b: T, c: T): boolean {
  const { additive: plus, multiplicative: times } = s
  const lhs = times.combine(plus.combine(a, b), c)
  const rhs = plus.combine(times.combine(a, c), times.combine(b, c))
  return s.equals(lhs, rhs)
}

// ─── Aggregate Reports ──────────────────────────────────────────────────────

export interface LawReport {
  readonly holds: boolean
  readonly violations: readonly string[]
}

function report(checks: ReadonlyArray<readonly [string, boolean]>): LawReport {
  const violations = checks.filter(([, ok]) => !ok).map(([law]) => law)
  return { holds: violations.length === 0, violations }
}

/** Associativity and both identity laws, sampled at (a, b, c). */
export function checkMonoidLaws<T>(
  m: Monoid<T>,
  a: T,
  b: T,
  c: T,
  equals: Equals<T> = Object.is,
): LawReport {
  return report([
    ['associativity', checkAssociativity(m, a, b, c, equals)],
    ['left identity', checkLeftIdentity(m, a, equals)],
    ['right identity', checkRightIdentity(m, a, equals)],
  ])
}

/**
 * Every semiring law sampled at (a, b, c): both monoids, additive
 * commutativity, absorption, distributivity, and idempotence where declared.
 */
export function checkSemiringLaws<T>(s: Semiring<T>, a: T, b: T, c: T): LawReport {
  const eq = s.equals
  const checks: Array<readonly [string, boolean]> = [
    ...checkMonoidLaws(s.additive, a, b, c, eq).violations.map((law) => [`additive ${law}`, false] as const),
    ...checkMonoidLaws(s.multiplicative, a, b, c, eq).violations.map((law) => [`multiplicative ${law}`, false] as const),
    ['additive commutativity', checkCommutativity(s.additive, a, b, eq)],
    ['left absorption', checkLeftAbsorption(s, a)],
    ['right absorption', checkRightAbsorption(s, a)],
    ['left distributivity', checkLeftDistributivity(s, a, b, c)],
    ['right distributivity', checkRightDistributivity(s, a, b, c)],
  ]
  if (s.idempotent) checks.push(['additive idempotence', checkIdempotence(s.additive, a, eq)])
  return report(checks)
}

/**
 * Deep equality over plain data: primitives (bigint and NaN included),
 * arrays, plain objects, Maps and Sets. Map keys and Set members are
 * matched by identity, values recursively; insertion order is ignored.
 */
export function structuralEquals<T>(a: T, b: T): boolean {
  return deepEquals(a, b)
}

function deepEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    return a.every((x, i) => deepEquals(x, b[i]))
  }
  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map) || !(b instanceof Map) || a.size !== b.size) return false
    for (const [k, v] of a) {
      if (!b.has(k) || !deepEquals(v, b.get(k))) return false
    }
    return true
  }
  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set) || !(b instanceof Set) || a.size !== b.size) return false
    for (const x of a) if (!b.has(x)) return false
    return true
  }
  const left = Object.entries(a)
  const right = new Map(Object.entries(b))
  if (left.length !== right.size) return false
  return left.every(([k, v]) => right.has(k) && deepEquals(v, right.get(k)))
}
