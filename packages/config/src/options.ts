/**
 * Per-call engine options. Each field overrides the matching field of the
 * environment config; absent fields fall back to it.
 */

import { z } from 'zod'
import {
  CLOSURE_STRATEGIES, ConfigError, REDUCE_STRATEGIES, getEngineConfig,
  type ClosureStrategy, type EngineConfig, type ReduceStrategy,
} from './engine-config.js'

const reduceOptionsSchema = z.object({
  strategy: z.enum(REDUCE_STRATEGIES).optional(),
  chunkSize: z.number().int().positive().optional(),
  parallelism: z.number().int().positive().optional(),
}).strict()

const closeOptionsSchema = z.object({
  strategy: z.enum(CLOSURE_STRATEGIES).optional(),
  earlyStop: z.boolean().optional(),
  size: z.number().int().nonnegative().optional(),
}).strict()

export type ReduceOptions = z.input<typeof reduceOptionsSchema>
export type CloseOptions = z.input<typeof closeOptionsSchema>

export interface ResolvedReduceOptions {
  readonly strategy: ReduceStrategy
  readonly chunkSize: number
  readonly parallelism: number | undefined
}

export interface ResolvedCloseOptions {
  readonly strategy: ClosureStrategy
  readonly earlyStop: boolean
  readonly size: number | undefined
}

export function parseReduceOptions(
  options: ReduceOptions = {},
  config: EngineConfig = getEngineConfig(),
): ResolvedReduceOptions {
  const parsed = reduceOptionsSchema.safeParse(options)
  if (!parsed.success) throw new ConfigError('reduce options', parsed.error.issues)
  const o = parsed.data
  return {
    strategy: o.strategy ?? config.reduce.strategy,
    chunkSize: o.chunkSize ?? config.reduce.chunkSize,
    parallelism: o.parallelism ?? config.reduce.parallelism,
  }
}

export function parseCloseOptions(
  options: CloseOptions = {},
  config: EngineConfig = getEngineConfig(),
): ResolvedCloseOptions {
  const parsed = closeOptionsSchema.safeParse(options)
  if (!parsed.success) throw new ConfigError('close options', parsed.error.issues)
  const o = parsed.data
  return {
    strategy: o.strategy ?? config.closure.strategy,
    earlyStop: o.earlyStop ?? config.closure.earlyStop,
    size: o.size,
  }
}
