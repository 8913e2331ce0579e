const encoder = new TextEncoder()

/**
 * Growable big-endian byte buffer.
 */
export class ByteWriter {
  private buffer: Uint8Array
  private view: DataView
  private length = 0

  constructor(initialCapacity: number = 256) {
    this.buffer = new Uint8Array(initialCapacity)
    this.view = new DataView(this.buffer.buffer)
  }

  u8(value: number): void {
    this.reserve(1)
    this.view.setUint8(this.length, value)
    this.length += 1
  }

  u32(value: number): void {
    this.reserve(4)
    this.view.setUint32(this.length, value)
    this.length += 4
  }

  i64(value: number | bigint): void {
    this.reserve(8)
    this.view.setBigInt64(this.length, typeof value === "bigint" ? value : BigInt(value))
    this.length += 8
  }

  f64(value: number): void {
    this.reserve(8)
    this.view.setFloat64(this.length, value)
    this.length += 8
  }

  /**
   * Length-prefixed UTF-8. A lone surrogate has no UTF-8 form and is written as U+FFFD, so
   * such a string decodes to its replaced form; that form then re-encodes unchanged.
   */
  str(value: string): void {
    const bytes = encoder.encode(value)
    this.u32(bytes.length)
    this.reserve(bytes.length)
    this.buffer.set(bytes, this.length)
    this.length += bytes.length
  }

  finish(): Uint8Array {
    return this.buffer.slice(0, this.length)
  }

  private reserve(extra: number): void {
    const needed = this.length + extra
    if (needed <= this.buffer.length) return

    let capacity = Math.max(this.buffer.length * 2, 16)
    while (capacity < needed) capacity *= 2

    const next = new Uint8Array(capacity)
    next.set(this.buffer.subarray(0, this.length))
    this.buffer = next
    this.view = new DataView(next.buffer)
  }
}
