import type { DecodeError } from "../core/wire/decode-error"
import type { Status } from "../core/status"
import type { Unrecognized } from "./classification"

export type Decoded<K extends string> = {
  readonly ok: true
  readonly status: Status<K | Unrecognized>
}

export type DecodeFailed = {
  readonly ok: false
  readonly error: DecodeError
}

/**
 * Outcome of decoding a status.
 *
 * @remarks
 * A malformed payload is a value, not an exception: callers reject the input and move on.
 */
export type DecodeResult<K extends string> = Decoded<K> | DecodeFailed

/**
 * Codec defines a bidirectional transformation between a {@link Status} and bytes.
 *
 * @remarks
 * Codecs sit at the boundary between in-process statuses and whatever transport carries
 * them (RPC replies, queues, IPC). Transports must treat codec output as opaque bytes.
 *
 * Codecs should be pure, deterministic transforms: encoding the result of a decode yields the
 * original bytes.
 */
export interface StatusCodec<K extends string> {
  encode(status: Status): Uint8Array

  decode(bytes: Uint8Array): DecodeResult<K>

  /**
   * Decode, throwing the {@link DecodeError} on malformed input.
   */
  decodeOrThrow(bytes: Uint8Array): Status<K | Unrecognized>
}
