import type { KeyType } from "../ports/key-type"
import type { ValueType } from "../ports/value-type"
import { InvalidCallbackError } from "./store-errors"

export type ValueCallback<V> = Readonly<{
  kind: "value"
  value: ValueType<V>
  fn: (value: V) => void
}>

export type EntryCallback<K, V> = Readonly<{
  kind: "entry"
  key: KeyType<K>
  value: ValueType<V>
  fn: (key: K, value: V) => void
}>

export type ForEachCallback<K, V> = ValueCallback<V> | EntryCallback<K, V>

/** Calls `fn` with each decoded value. */
export function onValue<V>(value: ValueType<V>, fn: (value: V) => void): ValueCallback<V> {
  return { kind: "value", value, fn }
}

/** Calls `fn` with each record's key, resolved through `key`, and decoded value. */
export function onEntry<K, V>(
  key: KeyType<K>,
  value: ValueType<V>,
  fn: (key: K, value: V) => void,
): EntryCallback<K, V> {
  return { kind: "entry", key, value, fn }
}

/** Decodes stored bytes into a value of `type`. */
export type Unmarshal = <T>(bytes: Uint8Array, type: ValueType<T>) => T

/** Handles one stored record. */
export type Dispatch = (key: Uint8Array, value: Uint8Array) => void

function checkArity(kind: string, fn: unknown, expected: number): void {
  if (typeof fn !== "function") throw InvalidCallbackError.notAFunction(kind)
  if (fn.length !== expected) throw InvalidCallbackError.arity(kind, expected, fn.length)
}

function resolveKey<K>(keyType: KeyType<K>, bytes: Uint8Array, unmarshal: Unmarshal): K {
  return keyType.kind === "raw" ? keyType.read(bytes) : unmarshal(bytes, keyType.type)
}

/**
 * Checks a callback descriptor and returns the per-record handler for it.
 *
 * @remarks
 * Everything is checked before the first record is read: the descriptor must
 * come from {@link onValue} or {@link onEntry}, and its function must declare
 * exactly one (value) or two (entry) parameters.
 *
 * @throws InvalidCallbackError
 */
export function createDispatcher<K, V>(
  callback: ForEachCallback<K, V>,
  unmarshal: Unmarshal,
): Dispatch {
  const raw: unknown = callback
  if (typeof raw !== "object" || raw === null || !("kind" in raw)) {
    throw InvalidCallbackError.unknownKind()
  }

  switch (callback.kind) {
    case "value": {
      const { value, fn } = callback
      checkArity("value", fn, 1)

      return (_key, bytes) => fn(unmarshal(bytes, value))
    }

    case "entry": {
      const { key, value, fn } = callback
      checkArity("entry", fn, 2)

      return (keyBytes, bytes) =>
        fn(resolveKey(key, keyBytes, unmarshal), unmarshal(bytes, value))
    }

    default:
      throw InvalidCallbackError.unknownKind()
  }
}
