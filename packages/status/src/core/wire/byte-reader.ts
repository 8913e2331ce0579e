import { isSafeBigInt } from "../context/context-value"
import { DecodeError } from "./decode-error"

const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * Bounds-checked big-endian reader. Every read past the end raises a `truncated`
 * {@link DecodeError}.
 */
export class ByteReader {
  private readonly view: DataView
  private position = 0

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get offset(): number {
    return this.position
  }

  get remaining(): number {
    return this.bytes.byteLength - this.position
  }

  u8(field: string): number {
    this.require(1, field)
    const value = this.view.getUint8(this.position)
    this.position += 1
    return value
  }

  u32(field: string): number {
    this.require(4, field)
    const value = this.view.getUint32(this.position)
    this.position += 4
    return value
  }

  /** Safe integers come back as numbers, anything wider as a bigint. */
  i64(field: string): number | bigint {
    this.require(8, field)
    const value = this.view.getBigInt64(this.position)
    this.position += 8
    return isSafeBigInt(value) ? Number(value) : value
  }

  f64(field: string): number {
    this.require(8, field)
    const value = this.view.getFloat64(this.position)
    this.position += 8
    return value
  }

  str(field: string): string {
    const length = this.u32(`${field} length`)
    this.require(length, field)

    const start = this.position
    const slice = this.bytes.subarray(start, start + length)
    this.position += length

    try {
      return decoder.decode(slice)
    } catch (cause) {
      throw new DecodeError("invalid_value", `${field} is not valid UTF-8`, {
        offset: start,
        context: { field },
        cause,
      })
    }
  }

  private require(count: number, field: string): void {
    if (this.remaining < count) {
      throw new DecodeError(
        "truncated",
        `Unexpected end of input reading ${field}: need ${count} byte(s), have ${this.remaining}`,
        { offset: this.position, context: { field, needed: count } },
      )
    }
  }
}
