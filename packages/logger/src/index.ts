export { NullLogger, createNullLogger } from "./adapters/null/null-logger"
export { PinoLogger } from "./adapters/pino/pino-logger"
export {
  type LoggerEnv,
  loadLoggerOptions,
  loggerEnvSchema,
} from "./core/load-logger-options"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export {
  isLogLevelName,
  type LogLevel,
  type LogLevelName,
  LogLevels,
  logLevelNames,
} from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerDependencies, LoggerOptions } from "./ports/logger-options"
