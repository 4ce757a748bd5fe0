// ---------------------------------------------------------------------------
// @semiring-kit/compute — Reduction and Closure Engines
// ---------------------------------------------------------------------------

export {
  type EngineErrorKind,
  SemiringKitError,
  EmptyReductionError,
  DimensionMismatchError,
  isSemiringKitError,
} from './errors.js';

// Slot pool and chunking
export type { SlotPool, Chunk } from './workers/worker-pool.js';
export { createSlotPool, runInSlot, resolveParallelism, fixedChunks } from './workers/worker-pool.js';

// Reduction Engine
export {
  reduce,
  reduceSemigroup,
  foldMap,
  foldRange,
  treeRange,
  chunkedRange,
} from './reduction/reduce.js';
export { reduceParallel } from './reduction/parallel.js';

// Matrices
export type { Matrix, Edge } from './matrix/matrix.js';
export {
  squareSize,
  zeroMatrix,
  identityMatrix,
  cloneMatrix,
  relationFromEdges,
  matrixEquals,
  matAdd,
  matMul,
  matrixMonoid,
  matrixPower,
} from './matrix/matrix.js';

// Closure Engine
export { close, closeInPlace, reflexiveClose } from './closure/close.js';
export {
  allPairsShortestPaths,
  reachability,
  countPaths,
  widestPaths,
  longestPaths,
} from './closure/paths.js';
