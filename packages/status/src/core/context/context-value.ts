import type { ContextFloat, ContextMap, ContextValue } from "../../ports/context-value"

export const MIN_INT64 = -(2n ** 63n)
export const MAX_INT64 = 2n ** 63n - 1n

/** Values already deep-frozen; appending them again shares instead of copying. */
const sealed = new WeakSet<object>()

export type ContextFields =
  | Iterable<readonly [string, ContextValue]>
  | Readonly<Record<string, ContextValue>>

export function isContextList(value: ContextValue): value is readonly ContextValue[] {
  return Array.isArray(value)
}

export function isContextMap(value: ContextValue): value is ContextMap {
  return value instanceof Map
}

export function isContextFloat(value: ContextValue): value is ContextFloat {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "float"
}

/**
 * Mark `value` as a float even when it is integral, so `2.0` and `-0.0` keep their float tag.
 */
export function contextFloat(value: number): ContextFloat {
  const float = Object.freeze({ kind: "float" as const, value })
  sealed.add(float)
  return float
}

/**
 * Build an ordered map value.
 *
 * Object literals enumerate integer-like keys first; pass entries to keep such keys in the
 * order given.
 *
 * @example
 * ```ts
 * status.withContext("limits", contextMap([["b", 1], ["1", 2]]))
 * ```
 */
export function contextMap(fields: ContextFields): ContextMap {
  const entries: Iterable<readonly [string, ContextValue]> = isEntryIterable(fields)
    ? fields
    : Object.entries(fields)
  return sealMap(
    [...entries].map(([key, value]): [string, ContextValue] => [key, freezeValue(value)]),
  )
}

function isEntryIterable(
  fields: ContextFields,
): fields is Iterable<readonly [string, ContextValue]> {
  return Symbol.iterator in fields
}

/** Freeze a list whose items are already frozen. */
export function sealList(items: ContextValue[]): readonly ContextValue[] {
  const list = Object.freeze(items)
  sealed.add(list)
  return list
}

/** Wrap entries whose values are already frozen in a read-only map. */
export function sealMap(entries: Iterable<readonly [string, ContextValue]>): ContextMap {
  const map: ContextMap = new Map(entries)
  sealed.add(map)
  return map
}

function normalizeInteger(value: bigint): number | bigint {
  if (value < MIN_INT64 || value > MAX_INT64) {
    throw new RangeError(`Integer ${value} does not fit in 64 bits`)
  }
  return isSafeBigInt(value) ? Number(value) : value
}

export function isSafeBigInt(value: bigint): boolean {
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
}

/**
 * Deep copy and freeze, so an entry never changes after it is appended.
 *
 * Bigints in the safe range become numbers and `-0` becomes `0`, which is what the value
 * decodes to. A bigint outside the signed 64-bit range throws a `RangeError`.
 */
export function freezeValue(value: ContextValue): ContextValue {
  if (typeof value === "bigint") return normalizeInteger(value)
  if (typeof value === "number") return Object.is(value, -0) ? 0 : value
  if (typeof value !== "object" || value === null) return value
  if (sealed.has(value)) return value

  if (isContextList(value)) return sealList(value.map(freezeValue))
  if (isContextMap(value)) {
    return sealMap(
      [...value].map(([key, item]): [string, ContextValue] => [key, freezeValue(item)]),
    )
  }
  return contextFloat(value.value)
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function isFloatShape(value: object): value is ContextFloat {
  return (
    "kind" in value && value.kind === "float" && "value" in value && typeof value.value === "number"
  )
}

/**
 * Runtime check for values arriving from untyped code. Plain objects are not context values;
 * see {@link toContextValue}.
 */
export function isContextValue(value: unknown): value is ContextValue {
  return checkValue(value, new Set())
}

function checkValue(value: unknown, ancestors: Set<object>): boolean {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true
    case "bigint":
      return value >= MIN_INT64 && value <= MAX_INT64
    case "object":
      break
    default:
      return false
  }

  if (value === null) return true
  if (ancestors.has(value)) return false

  ancestors.add(value)
  try {
    if (Array.isArray(value)) return value.every((item: unknown) => checkValue(item, ancestors))
    if (value instanceof Map) {
      return [...value].every(
        ([key, item]: [unknown, unknown]) => typeof key === "string" && checkValue(item, ancestors),
      )
    }
    return isFloatShape(value)
  } finally {
    ancestors.delete(value)
  }
}

/**
 * Convert an untyped value to a frozen context value, or `undefined` when it has no wire form.
 *
 * Plain objects become maps in property order. Cyclic structures are rejected.
 */
export function toContextValue(value: unknown): ContextValue | undefined {
  return convert(value, new Set())
}

function convert(value: unknown, ancestors: Set<object>): ContextValue | undefined {
  switch (typeof value) {
    case "string":
    case "boolean":
      return value
    case "number":
      return freezeValue(value)
    case "bigint":
      return value >= MIN_INT64 && value <= MAX_INT64 ? freezeValue(value) : undefined
    case "object":
      break
    default:
      return undefined
  }

  if (value === null) return null
  if (ancestors.has(value)) return undefined
  if (isFloatShape(value)) return contextFloat(value.value)
  if (!Array.isArray(value) && !(value instanceof Map) && !isPlainObject(value)) return undefined

  ancestors.add(value)
  try {
    if (Array.isArray(value)) {
      const items: ContextValue[] = []
      for (const item of value) {
        const next = convert(item, ancestors)
        if (next === undefined) return undefined
        items.push(next)
      }
      return sealList(items)
    }

    const fields: [unknown, unknown][] = value instanceof Map ? [...value] : Object.entries(value)
    const entries: [string, ContextValue][] = []
    for (const [key, item] of fields) {
      const next = convert(item, ancestors)
      if (typeof key !== "string" || next === undefined) return undefined
      entries.push([key, next])
    }
    return sealMap(entries)
  } finally {
    ancestors.delete(value)
  }
}

/**
 * Text form used when a value is substituted into a message: strings raw, lists and maps as
 * JSON-like text.
 */
export function formatValue(value: ContextValue): string {
  return typeof value === "string" ? value : valueText(value)
}

function valueText(value: ContextValue): string {
  if (typeof value === "string") return JSON.stringify(value)
  if (
    value === null ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean"
  ) {
    return String(value)
  }
  if (isContextList(value)) return `[${value.map(valueText).join(",")}]`
  if (isContextMap(value)) {
    const fields = [...value].map(([key, item]) => `${JSON.stringify(key)}:${valueText(item)}`)
    return `{${fields.join(",")}}`
  }
  return Object.is(value.value, -0) ? "-0" : String(value.value)
}
