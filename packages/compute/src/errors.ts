// ---------------------------------------------------------------------------
// @semiring-kit/compute — Engine Errors
// ---------------------------------------------------------------------------
// Contract violations detected at the call site. None are retried or
// corrected; they surface to the caller immediately.
// ---------------------------------------------------------------------------

export type EngineErrorKind = 'EmptyReduction' | 'DimensionMismatch';

/** Base class; switch on `kind` to tell engine errors apart. */
export abstract class SemiringKitError extends Error {
  abstract readonly kind: EngineErrorKind;
}

/** A Semigroup-only reduction was asked to combine zero elements. */
export class EmptyReductionError extends SemiringKitError {
  readonly kind = 'EmptyReduction' as const;

  constructor(public readonly strategy: string) {
    super(`Cannot reduce an empty sequence without an identity element (strategy: ${strategy})`);
    this.name = 'EmptyReductionError';
  }
}

/** A relation is ragged, not square, or not the size the caller declared. */
export class DimensionMismatchError extends SemiringKitError {
  readonly kind = 'DimensionMismatch' as const;

  constructor(
    public readonly rows: number,
    public readonly columns: number,
    public readonly expected?: number,
  ) {
    super(
      expected === undefined
        ? `Relation must be square: got ${rows}x${columns}`
        : `Relation must be ${expected}x${expected}: got ${rows}x${columns}`,
    );
    this.name = 'DimensionMismatchError';
  }
}

export function isSemiringKitError(e: unknown): e is SemiringKitError {
  return e instanceof SemiringKitError;
}
