/**
 * Structured logging.
 *
 * Emits one JSON line per event: ts, level, scope, msg, plus any fields.
 * debug/info go to stdout, warn/error to stderr. Entries below the
 * configured level are dropped before they are built.
 */

import { getEngineConfig, type LogLevel } from './engine-config.js'

export type LogFields = Record<string, unknown>

export interface LogEntry extends LogFields {
  readonly ts: string
  readonly level: Exclude<LogLevel, 'silent'>
  readonly scope: string
  readonly msg: string
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

export interface LoggerOptions {
  /** Defaults to the engine config's level, read at each call. */
  level?: LogLevel
  sink?: LogSink
}

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

function writeLine(entry: LogEntry): void {
  const line = JSON.stringify(entry) + '\n'
  if (entry.level === 'warn' || entry.level === 'error') {
    process.stderr.write(line)
  } else {
    process.stdout.write(line)
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? writeLine
  const threshold = (): number => SEVERITY[options.level ?? getEngineConfig().logLevel]

  const emit = (level: LogEntry['level'], msg: string, fields?: LogFields): void => {
    if (SEVERITY[level] > threshold()) return
    sink({ ...fields, ts: new Date().toISOString(), level, scope, msg })
  }

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  }
}
