import type { ByteSource } from "../../ports/byte-io"

export class ByteReader implements ByteSource {
  private offset = 0

  constructor(private readonly data: Uint8Array) {}

  /** Bytes not consumed yet. */
  get remaining(): number {
    return this.data.length - this.offset
  }

  read(length: number): Uint8Array {
    const end = Math.min(this.offset + Math.max(length, 0), this.data.length)
    const out = this.data.subarray(this.offset, end)
    this.offset = end
    return out
  }

  readUntil(delimiter: number): Uint8Array {
    const at = this.data.indexOf(delimiter, this.offset)
    return this.read(at === -1 ? this.remaining : at - this.offset + 1)
  }
}
