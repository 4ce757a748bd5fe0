// @semiring-kit/algebra — contracts, catalog, combinators, law checkers.

// ─── Contracts ──────────────────────────────────────────────────────────────
export {
  type Semigroup, type Monoid, type CommutativeMonoid, type Semiring, type SemiringSpec,
  semigroup, monoid, commutativeMonoid, semiring,
  identity, zero, one, add, mul,
  isMonoid, isCommutative,
} from './contracts.js'

// ─── Catalog ────────────────────────────────────────────────────────────────
export {
  sumMonoid, productMonoid, minMonoid, maxMonoid,
  bigintSumMonoid, bigintProductMonoid,
  anyMonoid, allMonoid,
  bitOrMonoid, bitAndMonoid, bitXorMonoid,
  stringMonoid, arrayMonoid,
  firstSemigroup, lastSemigroup,
  tropicalSemiring, maxPlusSemiring, booleanSemiring,
  countingSemiring, bigintCountingSemiring, bottleneckSemiring,
} from './catalog.js'

// ─── Combinators ────────────────────────────────────────────────────────────
export {
  pairSemigroup, pairMonoid, optionMonoid, mapMonoid,
  dualSemigroup, dualMonoid,
} from './combinators.js'

export { powerSemigroup, powerMonoid } from './power.js'

export {
  type Gaussian,
  gaussianMonoid, gaussianOf, gaussianFrom, observe,
  mean, variance, pdf, cdf, erf, gaussianEquals,
} from './gaussian.js'

// ─── Laws ───────────────────────────────────────────────────────────────────
export {
  type Equals, type LawReport,
  checkAssociativity, checkCommutativity, checkIdempotence,
  checkLeftIdentity, checkRightIdentity,
  checkLeftAbsorption, checkRightAbsorption,
  checkLeftDistributivity, checkRightDistributivity,
  checkMonoidLaws, checkSemiringLaws,
  structuralEquals,
} from './laws.js'
