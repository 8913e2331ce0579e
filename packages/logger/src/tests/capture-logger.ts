import type { LogContext, LogContextPatch, LogMeta } from "../ports/log-context"
import type { LogLevelName } from "../ports/log-level"
import type { Logger } from "../ports/logger"

export type CapturedLog = {
  level: LogLevelName
  message: string
  context: LogContextPatch
  meta: LogMeta
}

/**
 * In-memory logger for tests. Children share the parent's buffer.
 */
export class CaptureLogger implements Logger {
  constructor(
    readonly logs: CapturedLog[] = [],
    private readonly context: LogContextPatch = {},
  ) {}

  trace(message: string, meta: LogMeta = {}): void {
    this.logs.push({ level: "trace", message, context: this.context, meta })
  }

  debug(message: string, meta: LogMeta = {}): void {
    this.logs.push({ level: "debug", message, context: this.context, meta })
  }

  info(message: string, meta: LogMeta = {}): void {
    this.logs.push({ level: "info", message, context: this.context, meta })
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.logs.push({ level: "warn", message, context: this.context, meta })
  }

  error(message: string, meta: LogMeta = {}): void {
    this.logs.push({ level: "error", message, context: this.context, meta })
  }

  fatal(message: string, meta: LogMeta = {}): void {
    this.logs.push({ level: "fatal", message, context: this.context, meta })
  }

  child<U extends LogContextPatch>(context: U): Logger<LogContext & U> {
    return new CaptureLogger(this.logs, { ...this.context, ...context })
  }
}
