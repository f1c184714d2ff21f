import {
  ByteBuffer,
  ByteReader,
  type Codec,
  MarshalError,
  UnmarshalError,
} from "@larder/codec"
import { z } from "zod"
import type { ValueType } from "../ports/value-type"

/**
 * Encodes one value into a fresh byte array. The encoder goes back to the
 * codec only when encoding succeeded.
 */
export function marshal(codec: Codec, value: unknown): Uint8Array {
  const buffer = new ByteBuffer()
  const encoder = codec.newEncoder(buffer)

  try {
    encoder.encode(value)
  } catch (err) {
    throw MarshalError.from(codec.name, err)
  }

  codec.release?.(encoder)
  return buffer.bytes()
}

export function validate<T>(format: string, tree: unknown, type: ValueType<T>): T {
  const result = type.safeParse(tree)

  if (!result.success) {
    throw UnmarshalError.invalidValue(format, z.prettifyError(result.error), result.error)
  }

  return result.data
}

/** Decodes one value from `bytes` and validates it into `type`. */
export function unmarshal<T>(codec: Codec, bytes: Uint8Array, type: ValueType<T>): T {
  const decoder = codec.newDecoder(new ByteReader(bytes))

  let tree: unknown
  try {
    tree = decoder.decode()
  } catch (err) {
    throw UnmarshalError.from(codec.name, err)
  }

  codec.release?.(decoder)
  return validate(codec.name, tree, type)
}
