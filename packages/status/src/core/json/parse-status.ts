import { z } from "zod"
import type { ClassificationSet, Unrecognized } from "../../ports/classification"
import type { DecodeResult } from "../../ports/codec"
import type { ContextValue } from "../../ports/context-value"
import type {
  SerializedFloat,
  SerializedStatus,
  SerializedValue,
} from "../../ports/serialized-status"
import {
  contextFloat,
  freezeValue,
  MAX_INT64,
  MIN_INT64,
  sealList,
  sealMap,
} from "../context/context-value"
import { Status } from "../status"
import { DecodeError } from "../wire/decode-error"

const floatSchema = z.union([
  z.number(),
  z.literal("NaN"),
  z.literal("Infinity"),
  z.literal("-Infinity"),
  z.literal("-0"),
])

const integerSchema = z.union([
  z.number().int(),
  z
    .string()
    .regex(/^-?\d+$/)
    .refine((text) => {
      const value = BigInt(text)
      return value >= MIN_INT64 && value <= MAX_INT64
    }, "Integer does not fit in 64 bits"),
])

const entrySchema = z.object({ key: z.string(), value: z.lazy(() => serializedValueSchema) })

export const serializedValueSchema: z.ZodType<SerializedValue> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("string"), value: z.string() }),
    z.object({ type: z.literal("integer"), value: integerSchema }),
    z.object({ type: z.literal("float"), value: floatSchema }),
    z.object({ type: z.literal("boolean"), value: z.boolean() }),
    z.object({ type: z.literal("null"), value: z.null() }),
    z.object({ type: z.literal("list"), value: z.array(serializedValueSchema) }),
    z.object({
      type: z.literal("map"),
      value: z
        .array(entrySchema)
        .refine(
          (entries) => new Set(entries.map((entry) => entry.key)).size === entries.length,
          "Duplicate map key",
        ),
    }),
  ]),
)

export const serializedStatusSchema: z.ZodType<SerializedStatus> = z.lazy(() =>
  z.object({
    id: z.string(),
    message: z.string().optional(),
    context: z.array(entrySchema),
    cause: z.object({ internal: z.boolean(), status: serializedStatusSchema }).optional(),
  }),
)

function parseFloatValue(value: SerializedFloat): number {
  switch (value) {
    case "NaN":
      return Number.NaN
    case "Infinity":
      return Number.POSITIVE_INFINITY
    case "-Infinity":
      return Number.NEGATIVE_INFINITY
    case "-0":
      return -0
    default:
      return value
  }
}

export function parseValue(value: SerializedValue): ContextValue {
  switch (value.type) {
    case "integer":
      return typeof value.value === "string" ? freezeValue(BigInt(value.value)) : value.value
    case "float": {
      const float = parseFloatValue(value.value)
      return Number.isSafeInteger(float) ? contextFloat(float) : float
    }
    case "list":
      return sealList(value.value.map(parseValue))
    case "map":
      return sealMap(
        value.value.map((entry): [string, ContextValue] => [entry.key, parseValue(entry.value)]),
      )
    default:
      return value.value
  }
}

/**
 * Rebuild a status from its JSON form.
 *
 * Structural problems are reported as an `invalid_value` {@link DecodeError}; unknown
 * classification ids map to `UNRECOGNIZED`.
 *
 * @example
 * ```ts
 * const result = statusFromJSON(JSON.parse(body), Kinds)
 * if (!result.ok) return reject(result.error)
 * ```
 */
export function statusFromJSON<K extends string>(
  json: unknown,
  classifications: ClassificationSet<K>,
): DecodeResult<K> {
  const parsed = serializedStatusSchema.safeParse(json)

  if (!parsed.success) {
    return {
      ok: false,
      error: new DecodeError(
        "invalid_value",
        `Invalid serialized status:\n${z.prettifyError(parsed.error)}`,
        { cause: parsed.error },
      ),
    }
  }

  const levels: { node: SerializedStatus; internalCause: boolean }[] = []
  let node: SerializedStatus | undefined = parsed.data

  while (node) {
    levels.push({ node, internalCause: node.cause?.internal ?? false })
    node = node.cause?.status
  }

  let status: Status<K | Unrecognized> | undefined

  for (const { node: level, internalCause } of levels.reverse()) {
    const next: Status<K | Unrecognized> = new Status(classifications.parse(level.id), {
      cause: status,
      internal: internalCause,
      unrecognizedId: level.id,
    })
    if (level.message !== undefined) next.withMessage(level.message)
    for (const entry of level.context) next.withContext(entry.key, parseValue(entry.value))
    status = next
  }

  if (status === undefined) {
    return { ok: false, error: new DecodeError("empty", "No status found in input") }
  }

  return { ok: true, status }
}
