export type DecodeErrorCode =
  | "empty"
  | "unsupported_version"
  | "truncated"
  | "unknown_tag"
  | "invalid_marker"
  | "invalid_value"
  | "trailing_bytes"
  | "depth_exceeded"

export type DecodeErrorOptions = Readonly<{
  /** Byte offset where decoding stopped */
  offset?: number
  context?: Readonly<Record<string, unknown>>
  cause?: unknown
}>

/**
 * Raised for a payload that is not a well-formed status.
 *
 * An unknown classification id is not a decode error; it decodes to `UNRECOGNIZED`.
 */
export class DecodeError extends Error {
  readonly code: DecodeErrorCode
  readonly offset: number | undefined
  readonly context: Readonly<Record<string, unknown>>

  constructor(code: DecodeErrorCode, message: string, options: DecodeErrorOptions = {}) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = code
    this.offset = options.offset
    this.context = Object.freeze({ ...options.context })

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}
