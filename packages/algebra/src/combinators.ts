/**
 * Structure combinators: new lawful structures built from existing ones.
 */

import type { Monoid, Semigroup } from './contracts.js'
import { monoid, semigroup } from './contracts.js'

// ─── Products ───────────────────────────────────────────────────────────────

/** The direct product of two semigroups, componentwise. */
export function pairSemigroup<A, B>(
  a: Semigroup<A>,
  b: Semigroup<B>,
): Semigroup<readonly [A, B]> {
  return semigroup<readonly [A, B]>(([a1, b1], [a2, b2]) => [a.combine(a1, a2), b.combine(b1, b2)])
}

/** The direct product of two monoids. Identity is the pair of identities. */
export function pairMonoid<A, B>(a: Monoid<A>, b: Monoid<B>): Monoid<readonly [A, B]> {
  return monoid<readonly [A, B]>(
    [a.empty, b.empty],
    ([a1, b1], [a2, b2]) => [a.combine(a1, a2), b.combine(b1, b2)],
  )
}

// ─── Option ─────────────────────────────────────────────────────────────────

/**
 * Adjoin `undefined` as a fresh identity. Any semigroup becomes a monoid,
 * so identity-less structures can still reduce empty input.
 */
export function optionMonoid<T>(s: Semigroup<T>): Monoid<T | undefined> {
  return monoid<T | undefined>(undefined, (x, y) => {
    if (x === undefined) return y
    if (y === undefined) return x
    return s.combine(x, y)
  })
}

// ─── Maps ───────────────────────────────────────────────────────────────────

/**
 * Key-wise merge of maps. Values under a shared key combine with `s`,
 * left map's value first. The empty map is the identity.
 */
export function mapMonoid<K, V>(s: Semigroup<V>): Monoid<ReadonlyMap<K, V>> {
  return monoid<ReadonlyMap<K, V>>(new Map<K, V>(), (x, y) => {
    if (x.size === 0) return y
    if (y.size === 0) return x
    // Boxed so that a stored `undefined` value is distinguishable from a miss.
    const slots = new Map<K, { value: V }>()
    for (const [key, value] of x) slots.set(key, { value })
    for (const [key, value] of y) {
      const slot = slots.get(key)
      slots.set(key, slot ? { value: s.combine(slot.value, value) } : { value })
    }
    const merged = new Map<K, V>()
    for (const [key, slot] of slots) merged.set(key, slot.value)
    return merged
  })
}

// ─── Dual ───────────────────────────────────────────────────────────────────

/** Same operation with arguments swapped. */
export function dualSemigroup<T>(s: Semigroup<T>): Semigroup<T> {
  return semigroup<T>((a, b) => s.combine(b, a))
}

export function dualMonoid<T>(m: Monoid<T>): Monoid<T> {
  return monoid<T>(m.empty, (a, b) => m.combine(b, a))
}
