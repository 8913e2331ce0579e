export {
  createPinoLogger,
  PinoLogger,
  type PinoLoggerDeps,
  statusSerializer,
} from "./adapters/pino/pino-logger"
export {
  createStatusReporter,
  StatusReporter,
  type StatusReporterOptions,
} from "./core/status-reporter"
export type * from "./ports/log-context"
export { type LogLevel, type LogLevelName, LogLevels, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
