import type { ByteSource } from "../../ports/byte-io"

const MAX_UVARINT_BYTES = 8

/**
 * Unsigned LEB128 encoding of a non-negative safe integer.
 */
export function encodeUvarint(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`uvarint out of range: ${value}`)
  }

  const out: number[] = []
  let rest = value

  while (rest >= 0x80) {
    out.push((rest % 0x80) | 0x80)
    rest = Math.floor(rest / 0x80)
  }
  out.push(rest)

  return Uint8Array.from(out)
}

/**
 * Reads one uvarint. Returns undefined when the source is already exhausted.
 *
 * @throws RangeError on a truncated or oversized varint.
 */
export function readUvarint(source: ByteSource): number | undefined {
  let result = 0
  let multiplier = 1

  for (let i = 0; i < MAX_UVARINT_BYTES; i++) {
    const byte = source.read(1)[0]

    if (byte === undefined) {
      if (i === 0) return undefined
      throw new RangeError("truncated uvarint")
    }

    result += (byte & 0x7f) * multiplier
    if ((byte & 0x80) === 0) return result

    multiplier *= 0x80
  }

  throw new RangeError("uvarint too long")
}
