import type { ValueType } from "./value-type"

/**
 * How an entry callback receives record keys.
 *
 * `raw` key types turn the stored bytes into the key directly, `decoded` key
 * types run the bytes through the store codec and validate the result.
 */
export type KeyType<K> =
  | Readonly<{ kind: "raw"; name: string; read: (bytes: Uint8Array) => K }>
  | Readonly<{ kind: "decoded"; type: ValueType<K> }>

/**
 * Anything usable as a key. Byte arrays and strings are stored as-is (strings
 * as UTF-8); other keys are encoded with the store codec.
 */
export type StoreKey = Uint8Array | string | number | bigint | boolean | object
