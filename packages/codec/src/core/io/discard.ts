import type { ByteSink, ByteSource } from "../../ports/byte-io"

const EMPTY = new Uint8Array(0)

export const discardSink: ByteSink = {
  write(_chunk: Uint8Array): void {},
}

export const emptySource: ByteSource = {
  read(_length: number): Uint8Array {
    return EMPTY
  },
  readUntil(_delimiter: number): Uint8Array {
    return EMPTY
  },
}
