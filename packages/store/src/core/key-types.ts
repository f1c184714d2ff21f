import { UnmarshalError } from "@larder/codec"
import type { KeyType } from "../ports/key-type"
import type { ValueType } from "../ports/value-type"

const utf8 = new TextDecoder("utf-8", { fatal: true })

const bytes: KeyType<Uint8Array> = {
  kind: "raw",
  name: "bytes",
  read: (raw) => raw.slice(),
}

const text: KeyType<string> = {
  kind: "raw",
  name: "text",
  read: (raw) => {
    try {
      return utf8.decode(raw)
    } catch (err) {
      throw UnmarshalError.malformed("text", "key is not valid UTF-8", err)
    }
  },
}

export const keyTypes = {
  /** A copy of the stored key bytes. */
  bytes,

  /** The stored key decoded as UTF-8. */
  text,

  /** Keys written as values: decoded with the store codec, then validated. */
  decoded: <K>(type: ValueType<K>): KeyType<K> => ({ kind: "decoded", type }),
}
