// Shared configuration: environment-driven engine defaults, per-call option
// validation, structured logging.

export {
  loadEngineConfig,
  getEngineConfig,
  resetEngineConfig,
  ConfigError,
  LOG_LEVELS,
  REDUCE_STRATEGIES,
  CLOSURE_STRATEGIES,
  type EngineConfig,
  type LogLevel,
  type ReduceStrategy,
  type ClosureStrategy,
} from './engine-config.js'

export {
  parseReduceOptions,
  parseCloseOptions,
  type ReduceOptions,
  type CloseOptions,
  type ResolvedReduceOptions,
  type ResolvedCloseOptions,
} from './options.js'

export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogEntry,
  type LogFields,
  type LogSink,
} from './logger.js'
