import type { Status } from "@faultline/status"

export type LogContext = {
  service: string
  module: string
  env: string
  operation: string
  locale: string
}

export type LogEvent = {
  err: unknown

  /** Serialized through the status serializer of the adapter */
  status: Status

  /** Rendered cause chain, outermost first */
  chain: readonly string[]
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
