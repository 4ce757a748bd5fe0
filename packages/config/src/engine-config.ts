/**
 * Engine configuration: environment variables validated on first use.
 *
 * A malformed variable throws ConfigError; unset ones take the defaults below.
 */

import { z } from 'zod'

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export const REDUCE_STRATEGIES = ['sequential', 'tree', 'chunked'] as const
export type ReduceStrategy = (typeof REDUCE_STRATEGIES)[number]

export const CLOSURE_STRATEGIES = ['floyd-warshall', 'doubling'] as const
export type ClosureStrategy = (typeof CLOSURE_STRATEGIES)[number]

/** Error for configuration or options that fail validation. */
export class ConfigError extends Error {
  constructor(
    public readonly source: string,
    public readonly issues: readonly z.ZodIssue[],
  ) {
    super(
      `Invalid ${source}: ` +
      issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    )
    this.name = 'ConfigError'
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1')

const positiveInt = z.coerce.number().int().positive()

const envSchema = z.object({
  SEMIRING_KIT_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  SEMIRING_KIT_REDUCE_STRATEGY: z.enum(REDUCE_STRATEGIES).default('tree'),
  SEMIRING_KIT_CHUNK_SIZE: positiveInt.default(1024),
  SEMIRING_KIT_PARALLELISM: positiveInt.optional(),
  SEMIRING_KIT_CLOSURE_STRATEGY: z.enum(CLOSURE_STRATEGIES).default('floyd-warshall'),
  SEMIRING_KIT_CLOSURE_EARLY_STOP: booleanFlag.default('false'),
})

export interface EngineConfig {
  readonly logLevel: LogLevel
  readonly reduce: {
    readonly strategy: ReduceStrategy
    readonly chunkSize: number
    /** Unset means: derive from available cores. */
    readonly parallelism: number | undefined
  }
  readonly closure: {
    readonly strategy: ClosureStrategy
    readonly earlyStop: boolean
  }
}

/** Empty strings count as unset, as with shell `VAR=`. */
function definedOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('SEMIRING_KIT_') && value !== undefined && value !== '') out[key] = value
  }
  return out
}

/** Parse engine configuration from an environment map. */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(definedOnly(env))
  if (!parsed.success) throw new ConfigError('environment', parsed.error.issues)
  const e = parsed.data
  return {
    logLevel: e.SEMIRING_KIT_LOG_LEVEL,
    reduce: {
      strategy: e.SEMIRING_KIT_REDUCE_STRATEGY,
      chunkSize: e.SEMIRING_KIT_CHUNK_SIZE,
      parallelism: e.SEMIRING_KIT_PARALLELISM,
    },
    closure: {
      strategy: e.SEMIRING_KIT_CLOSURE_STRATEGY,
      earlyStop: e.SEMIRING_KIT_CLOSURE_EARLY_STOP,
    },
  }
}

let cached: EngineConfig | undefined

/** Process-wide config, loaded from process.env once. */
export function getEngineConfig(): EngineConfig {
  cached ??= loadEngineConfig()
  return cached
}

/** Drop the cached config so the next read re-parses the environment. */
export function resetEngineConfig(): void {
  cached = undefined
}
