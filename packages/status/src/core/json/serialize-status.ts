import type { ContextValue } from "../../ports/context-value"
import type {
  SerializedFloat,
  SerializedStatus,
  SerializedValue,
} from "../../ports/serialized-status"
import type { Status } from "../status"
import { isContextList, isContextMap, isSafeBigInt } from "../context/context-value"

function serializeFloat(value: number): SerializedFloat {
  if (Number.isNaN(value)) return "NaN"
  if (value === Infinity) return "Infinity"
  if (value === -Infinity) return "-Infinity"
  if (Object.is(value, -0)) return "-0"
  return value
}

export function serializeValue(value: ContextValue): SerializedValue {
  if (value === null) return { type: "null", value: null }

  switch (typeof value) {
    case "string":
      return { type: "string", value }
    case "boolean":
      return { type: "boolean", value }
    case "bigint":
      return { type: "integer", value: isSafeBigInt(value) ? Number(value) : value.toString() }
    case "number":
      if (Number.isSafeInteger(value)) return { type: "integer", value: value === 0 ? 0 : value }
      return { type: "float", value: serializeFloat(value) }
  }

  if (isContextList(value)) {
    return { type: "list", value: value.map(serializeValue) }
  }

  if (isContextMap(value)) {
    return {
      type: "map",
      value: [...value].map(([key, item]) => ({ key, value: serializeValue(item) })),
    }
  }

  return { type: "float", value: serializeFloat(value.value) }
}

/**
 * Serialize a status and its full cause chain to a JSON-safe shape.
 */
export function serializeStatus(status: Status): SerializedStatus {
  const levels = [...status.chain({ includeInternal: true })]

  let serialized: SerializedStatus | undefined

  for (const level of levels.reverse()) {
    serialized = {
      id: level.id,
      ...(level.literal !== undefined && { message: level.literal }),
      context: level.entries().map((entry) => ({
        key: entry.key,
        value: serializeValue(entry.value),
      })),
      ...(serialized !== undefined && {
        cause: { internal: level.isInternalCause, status: serialized },
      }),
    }
  }

  return serialized ?? { id: status.id, context: [] }
}
