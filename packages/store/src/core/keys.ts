import type { Codec } from "@larder/codec"
import type { StoreKey } from "../ports/key-type"
import { marshal } from "./marshal"

const utf8 = new TextEncoder()

/**
 * Bytes a key is stored under. Byte arrays are used as given and strings as
 * UTF-8; anything else is encoded with `codec`, so it must encode the same
 * way every time (no maps or sets with insertion-dependent order).
 */
export function deriveKey(codec: Codec, key: StoreKey): Uint8Array {
  if (key instanceof Uint8Array) return key
  if (typeof key === "string") return utf8.encode(key)

  return marshal(codec, key)
}
