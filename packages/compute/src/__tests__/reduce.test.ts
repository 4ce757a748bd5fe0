import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  sumMonoid,
  stringMonoid,
  arrayMonoid,
  maxMonoid,
  anyMonoid,
  gaussianMonoid,
  gaussianOf,
  gaussianFrom,
  gaussianEquals,
  semigroup,
} from '@semiring-kit/algebra';
import { ConfigError } from '@semiring-kit/config';
import { reduce, reduceSemigroup, foldMap } from '../reduction/reduce.js';
import { EmptyReductionError, isSemiringKitError } from '../errors.js';

/** Records the grouping it was applied with. Not associative. */
const paren = semigroup((a: string, b: string) => `(${a}${b})`);
const letters = ['a', 'b', 'c', 'd', 'e'];

const STRATEGIES = ['sequential', 'tree', 'chunked'] as const;

// ---------------------------------------------------------------------------
// Shapes
// ---------------------------------------------------------------------------

describe('reduction shapes', () => {
  it('sequential is a left fold', () => {
    expect(reduceSemigroup(paren, letters, { strategy: 'sequential' })).toBe('((((ab)c)d)e)');
  });

  it('tree splits at the midpoint', () => {
    expect(reduceSemigroup(paren, letters, { strategy: 'tree' })).toBe('((ab)(c(de)))');
  });

  it('chunked folds each chunk, then the partials', () => {
    expect(reduceSemigroup(paren, letters, { strategy: 'chunked', chunkSize: 2 })).toBe('(((ab)(cd))e)');
  });

  it('a single element is returned without combining', () => {
    for (const strategy of STRATEGIES) {
      expect(reduceSemigroup(paren, ['x'], { strategy })).toBe('x');
    }
  });
});

// ---------------------------------------------------------------------------
// Agreement
// ---------------------------------------------------------------------------

describe('every strategy agrees with the left fold', () => {
  it('on concrete values', () => {
    const xs = [1, 2, 3, 4, 5];
    for (const strategy of STRATEGIES) {
      expect(reduce(sumMonoid, xs, { strategy, chunkSize: 2 })).toBe(15);
    }
  });

  it('keeps order for a non-commutative monoid', () => {
    fc.assert(
      fc.property(
        fc.array(fc.string({ maxLength: 3 }), { maxLength: 60 }),
        fc.constantFrom(...STRATEGIES),
        fc.integer({ min: 1, max: 8 }),
        (xs, strategy, chunkSize) => reduce(stringMonoid, xs, { strategy, chunkSize }) === xs.join(''),
      ),
    );
  });

  it('concatenates arrays in input order', () => {
    fc.assert(
      fc.property(
        fc.array(fc.array(fc.integer(), { maxLength: 3 }), { maxLength: 40 }),
        fc.constantFrom(...STRATEGIES),
        (xss, strategy) => {
          const expected = xss.flat();
          const got = reduce(arrayMonoid<number>(), xss, { strategy, chunkSize: 3 });
          return got.length === expected.length && got.every((x, i) => x === expected[i]);
        },
      ),
    );
  });

  it('gives the streaming Gaussian summary', () => {
    const sample = [3, 1, 4, 1, 5, 9, 2, 6, 5, 3, 5];
    const lifted = sample.map(gaussianOf);
    for (const strategy of STRATEGIES) {
      expect(gaussianEquals(reduce(gaussianMonoid, lifted, { strategy, chunkSize: 4 }), gaussianFrom(sample))).toBe(true);
    }
  });
});

// ---------------------------------------------------------------------------
// Empty input
// ---------------------------------------------------------------------------

describe('empty input', () => {
  it('a monoid reduction yields the identity', () => {
    expect(reduce(sumMonoid, [])).toBe(0);
    expect(reduce(maxMonoid, [], { strategy: 'chunked' })).toBe(-Infinity);
    expect(reduce(anyMonoid, [])).toBe(false);
  });

  it('a semigroup reduction throws EmptyReductionError naming the strategy', () => {
    let caught: unknown;
    try {
      reduceSemigroup(paren, [], { strategy: 'tree' });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(EmptyReductionError);
    expect(isSemiringKitError(caught)).toBe(true);
    if (!(caught instanceof EmptyReductionError)) return;
    expect(caught.kind).toBe('EmptyReduction');
    expect(caught.strategy).toBe('tree');
    expect(caught.message).toBe(
      'Cannot reduce an empty sequence without an identity element (strategy: tree)',
    );
  });
});

// ---------------------------------------------------------------------------
// foldMap and options
// ---------------------------------------------------------------------------

describe('foldMap', () => {
  it('maps with the element index, then reduces', () => {
    expect(foldMap(sumMonoid, ['a', 'bb', 'ccc'], (s) => s.length)).toBe(6);
    expect(foldMap(stringMonoid, ['x', 'y'], (s, i) => `${i}${s}`)).toBe('0x1y');
  });

  it('maps an empty input to the identity', () => {
    expect(foldMap(sumMonoid, [], (s: string) => s.length)).toBe(0);
  });
});

describe('options', () => {
  it('rejects a non-positive chunk size', () => {
    expect(() => reduce(sumMonoid, [1, 2], { chunkSize: 0 })).toThrow(ConfigError);
  });
});
