import type { ClassificationSet, Unrecognized } from "../../ports/classification"
import type { DecodeResult, StatusCodec } from "../../ports/codec"
import type { ContextEntry, ContextValue } from "../../ports/context-value"
import type { StatusConfig } from "../config/load-status-config"
import {
  contextFloat,
  isContextList,
  isContextMap,
  sealList,
  sealMap,
} from "../context/context-value"
import { Status } from "../status"
import { ByteReader } from "./byte-reader"
import { ByteWriter } from "./byte-writer"
import { DecodeError } from "./decode-error"
import { CauseMarker, Presence, ValueTag, WIRE_VERSION } from "./wire-format"

export type WireCodecOptions<K extends string> = Readonly<{
  /** Classifications this process knows; anything else decodes to `UNRECOGNIZED` */
  classifications: ClassificationSet<K>

  /** Deepest list/map nesting accepted when decoding. Default: no limit */
  maxDepth?: number
}>

type WriteTask =
  | Readonly<{ kind: "key"; key: string }>
  | Readonly<{ kind: "value"; value: ContextValue }>

type ReadFrame =
  | { kind: "list"; remaining: number; items: ContextValue[] }
  | {
      kind: "map"
      remaining: number
      entries: [string, ContextValue][]
      keys: Set<string>
      key: string
    }

type DecodedLevel = {
  id: string
  message: string | undefined
  entries: ContextEntry[]
  internalCause: boolean
}

/**
 * Binary, self-describing wire form.
 *
 * ```
 * form    := version:u8 id:str message:opt-str context cause
 * context := count:u32 (key:str value)*
 * value   := tag:u8 payload
 * cause   := 0x00 | 0x01 form | 0x02 form
 * ```
 *
 * Integers are big-endian; strings are a u32 byte length followed by UTF-8. Nested lists and
 * maps are walked with an explicit stack on both sides, so any value that encodes also decodes
 * unless `maxDepth` is set lower than its nesting.
 */
export class WireStatusCodec<K extends string> implements StatusCodec<K> {
  private readonly classifications: ClassificationSet<K>
  private readonly maxDepth: number | undefined

  constructor(options: WireCodecOptions<K>) {
    this.classifications = options.classifications
    this.maxDepth = options.maxDepth
  }

  encode(status: Status): Uint8Array {
    const w = new ByteWriter()

    for (const level of status.chain({ includeInternal: true })) {
      w.u8(WIRE_VERSION)
      w.str(level.id)

      const literal = level.literal
      if (literal === undefined) {
        w.u8(Presence.Absent)
      } else {
        w.u8(Presence.Present)
        w.str(literal)
      }

      const entries = level.entries()
      w.u32(entries.length)
      for (const entry of entries) {
        w.str(entry.key)
        this.writeValue(w, entry.value)
      }

      if (level.cause === undefined) {
        w.u8(CauseMarker.None)
      } else {
        w.u8(level.isInternalCause ? CauseMarker.Internal : CauseMarker.Public)
      }
    }

    return w.finish()
  }

  decode(bytes: Uint8Array): DecodeResult<K> {
    try {
      return { ok: true, status: this.read(bytes) }
    } catch (error) {
      if (error instanceof DecodeError) return { ok: false, error }
      throw error
    }
  }

  decodeOrThrow(bytes: Uint8Array): Status<K | Unrecognized> {
    return this.read(bytes)
  }

  private read(bytes: Uint8Array): Status<K | Unrecognized> {
    if (bytes.byteLength === 0) {
      throw new DecodeError("empty", "Cannot decode a status from empty input", { offset: 0 })
    }

    const r = new ByteReader(bytes)
    const levels: DecodedLevel[] = []

    for (;;) {
      const level = this.readLevel(r)
      levels.push(level.decoded)
      if (!level.hasCause) break
    }

    if (r.remaining > 0) {
      throw new DecodeError("trailing_bytes", `${r.remaining} byte(s) after the end of the status`, {
        offset: r.offset,
      })
    }

    let status: Status<K | Unrecognized> | undefined

    for (const level of levels.reverse()) {
      const next: Status<K | Unrecognized> = new Status(this.classifications.parse(level.id), {
        cause: status,
        internal: level.internalCause,
        unrecognizedId: level.id,
      })
      if (level.message !== undefined) next.withMessage(level.message)
      for (const entry of level.entries) next.withContext(entry.key, entry.value)
      status = next
    }

    if (status === undefined) {
      throw new DecodeError("empty", "No status found in input", { offset: 0 })
    }

    return status
  }

  private readLevel(r: ByteReader): { decoded: DecodedLevel; hasCause: boolean } {
    const versionOffset = r.offset
    const version = r.u8("version")
    if (version !== WIRE_VERSION) {
      throw new DecodeError("unsupported_version", `Unsupported wire version ${version}`, {
        offset: versionOffset,
        context: { version, supported: WIRE_VERSION },
      })
    }

    const id = r.str("classification")
    const message = this.readOptionalString(r, "message")

    const count = r.u32("context length")
    const entries: ContextEntry[] = []
    for (let i = 0; i < count; i++) {
      const key = r.str("context key")
      entries.push({ key, value: this.readValue(r) })
    }

    const markerOffset = r.offset
    const marker = r.u8("cause marker")
    switch (marker) {
      case CauseMarker.None:
        return { decoded: { id, message, entries, internalCause: false }, hasCause: false }
      case CauseMarker.Public:
        return { decoded: { id, message, entries, internalCause: false }, hasCause: true }
      case CauseMarker.Internal:
        return { decoded: { id, message, entries, internalCause: true }, hasCause: true }
      default:
        throw new DecodeError("invalid_marker", `Unknown cause marker 0x${hex(marker)}`, {
          offset: markerOffset,
          context: { marker },
        })
    }
  }

  private readOptionalString(r: ByteReader, field: string): string | undefined {
    const offset = r.offset
    const presence = r.u8(`${field} presence`)
    if (presence === Presence.Absent) return undefined
    if (presence === Presence.Present) return r.str(field)

    throw new DecodeError("invalid_marker", `Unknown ${field} presence marker 0x${hex(presence)}`, {
      offset,
      context: { field, marker: presence },
    })
  }

  private writeValue(w: ByteWriter, root: ContextValue): void {
    const tasks: WriteTask[] = [{ kind: "value", value: root }]

    for (let task = tasks.pop(); task !== undefined; task = tasks.pop()) {
      if (task.kind === "key") {
        w.str(task.key)
        continue
      }

      const value = task.value

      if (isContextList(value)) {
        w.u8(ValueTag.List)
        w.u32(value.length)
        for (const item of [...value].reverse()) tasks.push({ kind: "value", value: item })
      } else if (isContextMap(value)) {
        const fields = [...value]
        w.u8(ValueTag.Map)
        w.u32(fields.length)
        for (const [key, item] of fields.reverse()) {
          tasks.push({ kind: "value", value: item })
          tasks.push({ kind: "key", key })
        }
      } else {
        this.writeScalar(w, value)
      }
    }
  }

  private writeScalar(w: ByteWriter, value: ContextValue): void {
    if (value === null) {
      w.u8(ValueTag.Null)
      return
    }

    switch (typeof value) {
      case "string":
        w.u8(ValueTag.String)
        w.str(value)
        return
      case "boolean":
        w.u8(ValueTag.Boolean)
        w.u8(value ? 1 : 0)
        return
      case "bigint":
        w.u8(ValueTag.Integer)
        w.i64(value)
        return
      case "number":
        if (Number.isSafeInteger(value)) {
          w.u8(ValueTag.Integer)
          w.i64(value)
        } else {
          w.u8(ValueTag.Float)
          w.f64(value)
        }
        return
    }

    if (!isContextList(value) && !isContextMap(value)) {
      w.u8(ValueTag.Float)
      w.f64(value.value)
    }
  }

  private readValue(r: ByteReader): ContextValue {
    const stack: ReadFrame[] = []

    for (;;) {
      const parent = stack[stack.length - 1]
      if (parent?.kind === "map") parent.key = this.readMapKey(r, parent.keys)

      const item = this.readItem(r, stack)
      if (item === undefined) continue

      let value: ContextValue = item

      for (;;) {
        const top = stack[stack.length - 1]
        if (top === undefined) return value

        if (top.kind === "list") top.items.push(value)
        else top.entries.push([top.key, value])

        top.remaining -= 1
        if (top.remaining > 0) break

        stack.pop()
        value = top.kind === "list" ? sealList(top.items) : sealMap(top.entries)
      }
    }
  }

  /**
   * Read one value, or open a non-empty list/map on `stack` and return `undefined`.
   */
  private readItem(r: ByteReader, stack: ReadFrame[]): ContextValue | undefined {
    const tagOffset = r.offset
    const tag = r.u8("value tag")

    switch (tag) {
      case ValueTag.String:
        return r.str("string value")
      case ValueTag.Integer:
        return r.i64("integer value")
      case ValueTag.Float: {
        const value = r.f64("float value")
        return Number.isSafeInteger(value) ? contextFloat(value) : value
      }
      case ValueTag.Boolean:
        return this.readBoolean(r)
      case ValueTag.Null:
        return null
      case ValueTag.List: {
        this.checkDepth(stack.length, tagOffset)
        const count = r.u32("list length")
        if (count === 0) return sealList([])
        stack.push({ kind: "list", remaining: count, items: [] })
        return undefined
      }
      case ValueTag.Map: {
        this.checkDepth(stack.length, tagOffset)
        const count = r.u32("map length")
        if (count === 0) return sealMap([])
        stack.push({ kind: "map", remaining: count, entries: [], keys: new Set(), key: "" })
        return undefined
      }
      default:
        throw new DecodeError("unknown_tag", `Unknown value tag 0x${hex(tag)}`, {
          offset: tagOffset,
          context: { tag },
        })
    }
  }

  private readMapKey(r: ByteReader, seen: Set<string>): string {
    const offset = r.offset
    const key = r.str("map key")
    if (seen.has(key)) {
      throw new DecodeError("invalid_value", `Duplicate map key "${key}"`, {
        offset,
        context: { key },
      })
    }
    seen.add(key)
    return key
  }

  private readBoolean(r: ByteReader): boolean {
    const offset = r.offset
    const byte = r.u8("boolean value")
    if (byte === 0) return false
    if (byte === 1) return true

    throw new DecodeError("invalid_value", `Invalid boolean byte 0x${hex(byte)}`, {
      offset,
      context: { byte },
    })
  }

  private checkDepth(depth: number, offset: number): void {
    if (this.maxDepth !== undefined && depth >= this.maxDepth) {
      throw new DecodeError("depth_exceeded", `Value nesting exceeds ${this.maxDepth} levels`, {
        offset,
        context: { maxDepth: this.maxDepth },
      })
    }
  }
}

function hex(byte: number): string {
  return byte.toString(16).padStart(2, "0")
}

export function createWireCodec<K extends string>(options: WireCodecOptions<K>): StatusCodec<K> {
  return new WireStatusCodec(options)
}

/**
 * Wire codec whose decode depth limit comes from {@link loadStatusConfig}.
 */
export function createConfiguredWireCodec<K extends string>(
  classifications: ClassificationSet<K>,
  config: Pick<StatusConfig, "maxDecodeDepth">,
): StatusCodec<K> {
  return new WireStatusCodec({ classifications, maxDepth: config.maxDecodeDepth })
}
