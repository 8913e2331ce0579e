import type { Classification } from "../ports/classification"
import type { ContextEntry, ContextValue, ReadonlyStatusContext } from "../ports/context-value"
import type { SerializedStatus } from "../ports/serialized-status"
import { StatusContext } from "./context/status-context"
import { serializeStatus } from "./json/serialize-status"
import { type ChainOptions, statusChain } from "./utils/status-chain"

/** Identifier reported for an unrecognized classification whose original id was lost. */
export const UNRECOGNIZED_ID = "unrecognized"

export type StatusOptions = Readonly<{
  /** Status this one wraps */
  cause?: Status

  /** Hide the cause from user-facing output. Default: false */
  internal?: boolean

  /** Original identifier when the classification is `UNRECOGNIZED` */
  unrecognizedId?: string
}>

export type WrapOptions = Pick<StatusOptions, "internal">

/**
 * Failure report: a classification plus context accumulated while the failure propagates.
 *
 * @remarks
 * A status is created at the failure site, enriched by each frame on the way up with
 * {@link Status.withContext}, and possibly wrapped by a frame that re-classifies it. Once it
 * is rendered or encoded it is treated as read-only.
 *
 * It extends `Error` so code that throws can throw it, but the intended channel is a
 * {@link Result}.
 *
 * @example
 * ```ts
 * function readConfig(path: string): Result<string, Kind> {
 *   const found = lookup(path)
 *   if (!found) return err(new Status("not_found").withContext("path", path))
 *   return ok(found)
 * }
 * ```
 */
export class Status<K extends Classification = Classification> extends Error {
  readonly classification: K

  /** `true` when the cause is hidden from user-facing output */
  readonly isInternalCause: boolean

  declare readonly cause: Status | undefined

  private readonly store = new StatusContext()
  private readonly unrecognizedId: string
  private literalMessage: string | undefined

  constructor(classification: K, options: StatusOptions = {}) {
    const id =
      typeof classification === "string"
        ? classification
        : (options.unrecognizedId ?? UNRECOGNIZED_ID)

    super(id, { cause: options.cause })

    this.name = this.constructor.name
    this.classification = classification
    this.isInternalCause = options.cause !== undefined && (options.internal ?? false)
    this.unrecognizedId = id
    this.literalMessage = undefined

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Re-classify `prior` while keeping it, unchanged, as the cause.
   *
   * The new status starts with an empty context of its own.
   */
  static wrap<K extends Classification>(
    classification: K,
    prior: Status,
    options: WrapOptions = {},
  ): Status<K> {
    return new Status(classification, { cause: prior, internal: options.internal ?? false })
  }

  /** Stable identifier, as written on the wire */
  get id(): string {
    return typeof this.classification === "string" ? this.classification : this.unrecognizedId
  }

  get context(): ReadonlyStatusContext {
    return this.store
  }

  /** Literal message set with {@link Status.withMessage}, if any */
  get literal(): string | undefined {
    return this.literalMessage
  }

  /**
   * Append a frozen copy of `value` under `key`.
   *
   * @throws RangeError for a bigint outside the signed 64-bit range
   */
  withContext(key: string, value: ContextValue): this {
    this.store.append(key, value)
    return this
  }

  /** Append one entry per own property, in property order. */
  withContextEntries(entries: Readonly<Record<string, ContextValue>>): this {
    for (const [key, value] of Object.entries(entries)) {
      this.store.append(key, value)
    }
    return this
  }

  /**
   * Use `text` verbatim when rendering. Context stays available programmatically.
   */
  withMessage(text: string): this {
    this.literalMessage = text
    this.message = text
    return this
  }

  entries(): readonly ContextEntry[] {
    return this.store.entries()
  }

  /**
   * Statuses from this one to the innermost cause.
   *
   * The returned iterable is lazy and can be iterated more than once.
   */
  chain(options: ChainOptions = {}): Iterable<Status> {
    return statusChain(this, options)
  }

  toJSON(): SerializedStatus {
    return serializeStatus(this)
  }
}
