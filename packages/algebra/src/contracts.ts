/**
 * Algebra Contracts
 *
 * Three capability sets, each a plain descriptor object over a carrier T:
 *
 *   Semigroup: combine(a, b), associative
 *   Monoid:    Semigroup + empty, a two-sided identity
 *   Semiring:  additive Monoid (⊕, 0) + multiplicative Monoid (⊗, 1)
 *
 * Laws are preconditions. Nothing here checks them at run time: a structure
 * that breaks them produces wrong results, not exceptions. See ./laws for
 * checkers meant for tests.
 */

// ─── Semigroup ──────────────────────────────────────────────────────────────

/**
 * A closed, associative binary operation.
 *
 * Law:
 *   combine(combine(a, b), c) ≡ combine(a, combine(b, c))
 */
export interface Semigroup<T> {
  combine(a: T, b: T): T
}

// ─── Monoid ─────────────────────────────────────────────────────────────────

/**
 * A semigroup with an identity element.
 *
 * Laws:
 *   combine(empty, a) ≡ a   (left identity)
 *   combine(a, empty) ≡ a   (right identity)
 */
export interface Monoid<T> extends Semigroup<T> {
  readonly empty: T
}

/** A monoid whose operation also satisfies combine(a, b) ≡ combine(b, a). */
export interface CommutativeMonoid<T> extends Monoid<T> {
  readonly commutative: true
}

// ─── Semiring ───────────────────────────────────────────────────────────────

/**
 * Two monoids over one carrier.
 *
 * Laws:
 *   a ⊗ (b ⊕ c) ≡ (a ⊗ b) ⊕ (a ⊗ c)   (left distributivity)
 *   (a ⊕ b) ⊗ c ≡ (a ⊗ c) ⊕ (b ⊗ c)   (right distributivity)
 *   0 ⊗ a ≡ 0 ≡ a ⊗ 0                  (absorption)
 *
 * `idempotent` declares a ⊕ a ≡ a. The closure engine uses it to decide
 * whether early convergence checks are sound.
 */
export interface Semiring<T> {
  readonly additive: Monoid<T>
  readonly multiplicative: Monoid<T>
  readonly idempotent: boolean
  /** Carrier equality. */
  equals(a: T, b: T): boolean
}

// ─── Constructors ───────────────────────────────────────────────────────────

export function semigroup<T>(combine: (a: T, b: T) => T): Semigroup<T> {
  return Object.freeze({ combine })
}

export function monoid<T>(empty: T, combine: (a: T, b: T) => T): Monoid<T> {
  return Object.freeze({ empty, combine })
}

export function commutativeMonoid<T>(
  empty: T,
  combine: (a: T, b: T) => T,
): CommutativeMonoid<T> {
  return Object.freeze({ empty, combine, commutative: true as const })
}

export interface SemiringSpec<T> {
  readonly additive: Monoid<T>
  readonly multiplicative: Monoid<T>
  readonly idempotent?: boolean
  readonly equals?: (a: T, b: T) => boolean
}

/** Build a semiring descriptor; `idempotent` defaults to false, `equals` to Object.is. */
export function semiring<T>(spec: SemiringSpec<T>): Semiring<T> {
  return Object.freeze({
    additive: spec.additive,
    multiplicative: spec.multiplicative,
    idempotent: spec.idempotent ?? false,
    equals: spec.equals ?? Object.is,
  })
}

// ─── Accessors ──────────────────────────────────────────────────────────────

/** The identity of a monoid. */
export function identity<T>(m: Monoid<T>): T {
  return m.empty
}

/** Additive identity (0). Absorbing under ⊗. */
export function zero<T>(s: Semiring<T>): T {
  return s.additive.empty
}

/** Multiplicative identity (1). */
export function one<T>(s: Semiring<T>): T {
  return s.multiplicative.empty
}

export function add<T>(s: Semiring<T>, a: T, b: T): T {
  return s.additive.combine(a, b)
}

export function mul<T>(s: Semiring<T>, a: T, b: T): T {
  return s.multiplicative.combine(a, b)
}

/** Distinguish a Monoid from a bare Semigroup at run time. */
export function isMonoid<T>(structure: Semigroup<T> | Monoid<T>): structure is Monoid<T> {
  return 'empty' in structure
}

export function isCommutative<T>(m: Monoid<T>): m is CommutativeMonoid<T> {
  return 'commutative' in m && m.commutative === true
}
