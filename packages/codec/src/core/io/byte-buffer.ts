import type { ByteSink } from "../../ports/byte-io"

const INITIAL_CAPACITY = 256

/**
 * Growable in-memory sink.
 */
export class ByteBuffer implements ByteSink {
  private buf = new Uint8Array(INITIAL_CAPACITY)
  private size = 0

  get length(): number {
    return this.size
  }

  write(chunk: Uint8Array): void {
    this.ensure(this.size + chunk.length)
    this.buf.set(chunk, this.size)
    this.size += chunk.length
  }

  /** Copy of everything written since the last reset. */
  bytes(): Uint8Array {
    return this.buf.slice(0, this.size)
  }

  reset(): void {
    this.size = 0
  }

  private ensure(capacity: number): void {
    if (capacity <= this.buf.length) return

    let next = this.buf.length * 2
    while (next < capacity) next *= 2

    const grown = new Uint8Array(next)
    grown.set(this.buf.subarray(0, this.size))
    this.buf = grown
  }
}
