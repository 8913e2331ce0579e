import type { Status } from "../core/status"
import type { Classification } from "./classification"

export type Ok<T> = {
  readonly ok: true
  readonly value: T
}

export type Err<K extends Classification = Classification> = {
  readonly ok: false
  readonly status: Status<K>
}

/**
 * Return channel for fallible operations that report through a {@link Status}.
 */
export type Result<T, K extends Classification = Classification> = Ok<T> | Err<K>
