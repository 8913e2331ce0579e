import {
  type MessageResolver,
  renderChain,
  type Status,
  type StatusConfig,
} from "@faultline/status"
import type { LogMeta } from "../ports/log-context"
import type { LogLevelName } from "../ports/log-level"
import type { Logger } from "../ports/logger"

export type StatusReporterOptions = Readonly<{
  logger: Logger
  resolver: MessageResolver
  config: Pick<StatusConfig, "locale" | "unknownMarker" | "includeInternal">

  /** Level statuses are logged at. Default: "error" */
  level?: LogLevelName
}>

/**
 * Boundary where a status stops propagating and becomes a log line.
 *
 * The message is the outermost rendering; the entry carries the serialized status and the
 * rendered chain.
 */
export class StatusReporter {
  private readonly logger: Logger
  private readonly level: LogLevelName

  constructor(private readonly options: StatusReporterOptions) {
    this.logger = options.logger.child({ locale: options.config.locale })
    this.level = options.level ?? "error"
  }

  /**
   * Log `status` and return the rendered headline.
   */
  report(status: Status, meta: LogMeta = {}): string {
    const chain = renderChain(status, {
      locale: this.options.config.locale,
      resolver: this.options.resolver,
      unknownMarker: this.options.config.unknownMarker,
      includeInternal: this.options.config.includeInternal,
    })
    const headline = chain[0] ?? status.id

    this.logger[this.level](headline, { ...meta, status, chain })

    return headline
  }
}

export function createStatusReporter(options: StatusReporterOptions): StatusReporter {
  return new StatusReporter(options)
}
