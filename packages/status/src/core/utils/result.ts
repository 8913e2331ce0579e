import type { Classification } from "../../ports/classification"
import type { Err, Ok } from "../../ports/result"
import type { Status } from "../status"

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<K extends Classification>(status: Status<K>): Err<K> {
  return { ok: false, status }
}
