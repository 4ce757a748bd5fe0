import { describe, it, expect, afterEach, vi } from 'vitest'
import {
  loadEngineConfig,
  getEngineConfig,
  resetEngineConfig,
  ConfigError,
  type EngineConfig,
} from '../engine-config.js'
import { parseReduceOptions, parseCloseOptions } from '../options.js'
import { createLogger, type LogEntry } from '../logger.js'

const ENV_KEYS = [
  'SEMIRING_KIT_LOG_LEVEL',
  'SEMIRING_KIT_CHUNK_SIZE',
] as const

afterEach(() => {
  for (const key of ENV_KEYS) delete process.env[key]
  resetEngineConfig()
  vi.restoreAllMocks()
})

const defaults: EngineConfig = {
  logLevel: 'warn',
  reduce: { strategy: 'tree', chunkSize: 1024, parallelism: undefined },
  closure: { strategy: 'floyd-warshall', earlyStop: false },
}

describe('loadEngineConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadEngineConfig({})).toEqual(defaults)
  })

  it('reads every variable', () => {
    const config = loadEngineConfig({
      SEMIRING_KIT_LOG_LEVEL: 'debug',
      SEMIRING_KIT_REDUCE_STRATEGY: 'chunked',
      SEMIRING_KIT_CHUNK_SIZE: '64',
      SEMIRING_KIT_PARALLELISM: '3',
      SEMIRING_KIT_CLOSURE_STRATEGY: 'doubling',
      SEMIRING_KIT_CLOSURE_EARLY_STOP: '1',
    })
    expect(config).toEqual({
      logLevel: 'debug',
      reduce: { strategy: 'chunked', chunkSize: 64, parallelism: 3 },
      closure: { strategy: 'doubling', earlyStop: true },
    })
  })

  it('treats empty strings as unset and ignores unrelated variables', () => {
    expect(loadEngineConfig({ SEMIRING_KIT_CHUNK_SIZE: '', PATH: '/usr/bin' })).toEqual(defaults)
  })

  it('parses early-stop spellings', () => {
    expect(loadEngineConfig({ SEMIRING_KIT_CLOSURE_EARLY_STOP: 'true' }).closure.earlyStop).toBe(true)
    expect(loadEngineConfig({ SEMIRING_KIT_CLOSURE_EARLY_STOP: '0' }).closure.earlyStop).toBe(false)
  })

  it('fails fast on a non-positive chunk size', () => {
    try {
      loadEngineConfig({ SEMIRING_KIT_CHUNK_SIZE: '0' })
      expect.unreachable('expected ConfigError')
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError)
      if (!(e instanceof ConfigError)) return
      expect(e.source).toBe('environment')
      expect(e.issues.map((i) => i.path)).toEqual([['SEMIRING_KIT_CHUNK_SIZE']])
      expect(e.message.startsWith('Invalid environment: SEMIRING_KIT_CHUNK_SIZE: ')).toBe(true)
    }
  })

  it('rejects unknown enum values', () => {
    expect(() => loadEngineConfig({ SEMIRING_KIT_LOG_LEVEL: 'verbose' })).toThrow(ConfigError)
    expect(() => loadEngineConfig({ SEMIRING_KIT_CLOSURE_EARLY_STOP: 'yes' })).toThrow(ConfigError)
    expect(() => loadEngineConfig({ SEMIRING_KIT_PARALLELISM: '2.5' })).toThrow(ConfigError)
  })
})

describe('getEngineConfig', () => {
  it('caches until reset', () => {
    process.env.SEMIRING_KIT_CHUNK_SIZE = '7'
    resetEngineConfig()
    expect(getEngineConfig().reduce.chunkSize).toBe(7)

    process.env.SEMIRING_KIT_CHUNK_SIZE = '9'
    expect(getEngineConfig().reduce.chunkSize).toBe(7)

    resetEngineConfig()
    expect(getEngineConfig().reduce.chunkSize).toBe(9)
  })
})

describe('per-call options', () => {
  it('override the config field by field', () => {
    expect(parseReduceOptions({ chunkSize: 8 }, defaults)).toEqual({
      strategy: 'tree',
      chunkSize: 8,
      parallelism: undefined,
    })
    expect(parseCloseOptions({ strategy: 'doubling', size: 4 }, defaults)).toEqual({
      strategy: 'doubling',
      earlyStop: false,
      size: 4,
    })
  })

  it('are validated', () => {
    expect(() => parseReduceOptions({ chunkSize: 0 }, defaults)).toThrow(ConfigError)
    expect(() => parseReduceOptions({ parallelism: 1.5 }, defaults)).toThrow(ConfigError)
    expect(() => parseCloseOptions({ size: -1 }, defaults)).toThrow(ConfigError)
  })

  it('name the option source in the error', () => {
    expect(() => parseCloseOptions({ size: -1 }, defaults)).toThrow(/^Invalid close options: size: /)
  })
})

describe('createLogger', () => {
  it('filters below the configured level and tags entries', () => {
    const entries: LogEntry[] = []
    const log = createLogger('test', { level: 'info', sink: (e) => entries.push(e) })

    log.debug('dropped')
    log.info('kept', { n: 3 })
    log.error('also kept')

    expect(entries.map((e) => [e.level, e.msg])).toEqual([['info', 'kept'], ['error', 'also kept']])
    expect(entries[0]).toMatchObject({ scope: 'test', level: 'info', msg: 'kept', n: 3 })
    expect(typeof entries[0].ts).toBe('string')
  })

  it('silent drops everything', () => {
    const sink = vi.fn()
    const log = createLogger('test', { level: 'silent', sink })
    log.error('nope')
    expect(sink).not.toHaveBeenCalled()
  })

  it('fields cannot overwrite reserved keys', () => {
    const entries: LogEntry[] = []
    const log = createLogger('real', { level: 'debug', sink: (e) => entries.push(e) })
    log.debug('m', { scope: 'fake', msg: 'fake' })
    expect(entries[0].scope).toBe('real')
    expect(entries[0].msg).toBe('m')
  })

  it('follows the environment level when none is given', () => {
    process.env.SEMIRING_KIT_LOG_LEVEL = 'error'
    resetEngineConfig()
    const entries: LogEntry[] = []
    const log = createLogger('env', { sink: (e) => entries.push(e) })
    log.warn('below threshold')
    log.error('at threshold')
    expect(entries.map((e) => e.msg)).toEqual(['at threshold'])
  })

  it('writes JSON lines: warn to stderr, info to stdout', () => {
    const err = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    const log = createLogger('io', { level: 'debug' })

    log.warn('careful', { k: 1 })
    log.info('fyi')

    expect(err).toHaveBeenCalledTimes(1)
    expect(out).toHaveBeenCalledTimes(1)
    const line = String(err.mock.calls[0][0])
    expect(line.endsWith('\n')).toBe(true)
    expect(JSON.parse(line)).toMatchObject({ level: 'warn', scope: 'io', msg: 'careful', k: 1 })
  })
})
