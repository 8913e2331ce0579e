export type SerializedFloat = number | "NaN" | "Infinity" | "-Infinity" | "-0"

/** Integers wider than the safe range are written as decimal strings. */
export type SerializedInteger = number | string

export type SerializedValue =
  | { type: "string"; value: string }
  | { type: "integer"; value: SerializedInteger }
  | { type: "float"; value: SerializedFloat }
  | { type: "boolean"; value: boolean }
  | { type: "null"; value: null }
  | { type: "list"; value: SerializedValue[] }
  | { type: "map"; value: SerializedEntry[] }

export type SerializedEntry = {
  key: string
  value: SerializedValue
}

/**
 * JSON form of a status for logging, APIs, and transport.
 *
 * Designed to be JSON.stringify-safe. Numbers keep their integer/float tag so a value never
 * changes type on the way through.
 */
export type SerializedStatus = {
  id: string
  message?: string
  context: SerializedEntry[]
  cause?: {
    internal: boolean
    status: SerializedStatus
  }
}
