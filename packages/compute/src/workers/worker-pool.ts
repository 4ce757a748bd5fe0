// ---------------------------------------------------------------------------
// @semiring-kit/compute — Slot Pool and Chunking
// ---------------------------------------------------------------------------
// A bounded pool of execution slots for fork/join reductions. Tasks beyond
// the pool size wait in FIFO order until a running task frees its slot, so
// at most `size` chunk folds are in flight at once. Each task runs on its
// own macrotask, letting queued I/O interleave with a long reduction.
// ---------------------------------------------------------------------------

import { availableParallelism } from 'node:os';

/** A contiguous slice `[offset, offset + length)` of the input. */
export type Chunk = { offset: number; length: number };

export interface SlotPool {
  readonly size: number;
  /** Slots currently held by a running task. */
  busy: number;
  /** Highest `busy` seen since creation. */
  peakBusy: number;
  /** Tasks waiting for a slot, oldest first. */
  readonly waiting: Array<() => void>;
}

export function createSlotPool(size: number): SlotPool {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Pool size must be a positive integer, got ${size}`);
  }
  return { size, busy: 0, peakBusy: 0, waiting: [] };
}

function acquire(pool: SlotPool, start: () => void): void {
  if (pool.busy < pool.size) {
    pool.busy++;
    pool.peakBusy = Math.max(pool.peakBusy, pool.busy);
    start();
  } else {
    pool.waiting.push(start);
  }
}

/** Hand the slot straight to the oldest waiter, or free it. */
function release(pool: SlotPool): void {
  const next = pool.waiting.shift();
  if (next === undefined) {
    pool.busy--;
  } else {
    next();
  }
}

/**
 * Run `task` once a slot is free. The slot is released whether the task
 * returns or throws; a throw rejects the returned promise.
 */
export function runInSlot<R>(pool: SlotPool, task: () => R): Promise<R> {
  return new Promise<R>((resolve, reject) => {
    acquire(pool, () => {
      setImmediate(() => {
        try {
          resolve(task());
        } catch (e) {
          reject(e);
        } finally {
          release(pool);
        }
      });
    });
  });
}

/** Explicit parallelism if given, otherwise every core but one. */
export function resolveParallelism(requested: number | undefined): number {
  return requested ?? Math.max(1, availableParallelism() - 1);
}

/** Split `dataLength` items into consecutive chunks of at most `chunkSize`. */
export function fixedChunks(dataLength: number, chunkSize: number): Chunk[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  const chunks: Chunk[] = [];
  for (let offset = 0; offset < dataLength; offset += chunkSize) {
    chunks.push({ offset, length: Math.min(chunkSize, dataLength - offset) });
  }
  return chunks;
}
