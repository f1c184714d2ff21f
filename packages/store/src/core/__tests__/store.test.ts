import { MarshalError, UnmarshalError } from "@larder/codec"
import { z } from "zod"
import type { TransactionalEngine } from "../../ports/engine"
import { engineFactories } from "../../tests/utils/engines"
import { Person, person, Stranger, text, utf8 } from "../../tests/utils/fixtures"
import { CODEC_BUCKET } from "../codec-guard"
import { createBinaryStore, createJsonStore } from "../create-store"
import { onEntry, onValue } from "../dispatcher"
import { keyTypes } from "../key-types"
import type { Store } from "../store"
import {
  CodecMismatchError,
  InvalidCallbackError,
  NotFoundError,
  StorageError,
} from "../store-errors"

function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error("expected the call to throw")
}

describe.each(engineFactories)("Store on %s", (_name, createEngine) => {
  let engine: TransactionalEngine
  let store: Store

  beforeEach(async () => {
    engine = await createEngine()
    store = createJsonStore({ engine, bucket: "people" })
  })

  afterEach(() => {
    engine.close()
  })

  describe("put / get", () => {
    it("reads back a stored value as an instance of its class", () => {
      store.put("ada", new Person("Ada", 36))

      const got = store.get("ada", person)

      expect(got).toBeInstanceOf(Person)
      expect(got).toEqual(new Person("Ada", 36))
    })

    it("overwrites the value under an existing key", () => {
      store.put("ada", new Person("Ada", 36))
      store.put("ada", new Person("Ada", 37))

      expect(store.get("ada", person).age).toBe(37)
    })

    it("reports a missing bucket", () => {
      expect(() => store.get("ada", person)).toThrow("bucket not found: people")
    })

    it("reports a missing key", () => {
      store.put("ada", new Person("Ada"))

      expect(() => store.get("bob", person)).toThrow(NotFoundError)
      expect(() => store.get("bob", person)).toThrow("key not found in bucket people")
    })

    it("treats a byte key and its UTF-8 string as the same key", () => {
      store.put(utf8("ada"), new Person("Ada"))

      expect(store.get("ada", person).name).toBe("Ada")
    })

    it("encodes other keys with the store codec", () => {
      store.put({ id: 7 }, new Person("Ada"))

      expect(store.get({ id: 7 }, person).name).toBe("Ada")
      expect(store.has({ id: 8 })).toBe(false)
    })

    it("fails validation when the stored value is not of the requested type", () => {
      store.put("ada", { name: 1 })

      expect(() => store.get("ada", z.object({ name: z.string() }))).toThrow(UnmarshalError)
    })

    it("refuses a value its codec cannot encode without touching the engine", () => {
      const binary = createBinaryStore({ engine, bucket: "strangers" })
      const update = vi.spyOn(engine, "update")

      expect(() => binary.put("x", new Stranger("Eve"))).toThrow(MarshalError)
      expect(update).not.toHaveBeenCalled()
    })
  })

  describe("has / delete / pull", () => {
    it("tells whether a key is present", () => {
      expect(store.has("ada")).toBe(false)

      store.put("ada", new Person("Ada"))

      expect(store.has("ada")).toBe(true)
      expect(store.has("bob")).toBe(false)
    })

    it("deletes a key and ignores absent ones", () => {
      store.delete("nobody")
      store.put("ada", new Person("Ada"))

      store.delete("ada")
      store.delete("ada")

      expect(store.has("ada")).toBe(false)
    })

    it("returns the value and removes it", () => {
      store.put("ada", new Person("Ada"))

      expect(store.pull("ada", person).name).toBe("Ada")
      expect(store.has("ada")).toBe(false)
      expect(() => store.pull("ada", person)).toThrow(NotFoundError)
    })

    it("removes the key even when the value then fails to decode", () => {
      store.put("n", 42)

      expect(() => store.pull("n", z.string())).toThrow(UnmarshalError)
      expect(store.has("n")).toBe(false)
    })
  })

  describe("forEach", () => {
    it("never calls back for a bucket that does not exist", () => {
      const seen: Person[] = []

      store.forEach(onValue(person, (p) => seen.push(p)))

      expect(seen).toEqual([])
    })

    it("visits values in byte order of their keys", () => {
      for (const name of ["carol", "ada", "bob"]) store.put(name, new Person(name))
      const names: string[] = []

      store.forEach(onValue(person, (p) => names.push(p.name)))

      expect(names).toEqual(["ada", "bob", "carol"])
    })

    it("hands entry callbacks the raw key bytes", () => {
      store.put(utf8("k"), new Person("Ada"))
      const entries: [number[], string][] = []

      store.forEach(
        onEntry(keyTypes.bytes, person, (key, p) => entries.push([Array.from(key), p.name])),
      )

      expect(entries).toEqual([[[0x6b], "Ada"]])
    })

    it("decodes text keys", () => {
      store.put("ada", new Person("Ada", 36))
      const entries: [string, number | undefined][] = []

      store.forEach(onEntry(keyTypes.text, person, (key, p) => entries.push([key, p.age])))

      expect(entries).toEqual([["ada", 36]])
    })

    it("decodes keys that were written as values", () => {
      store.put(42, new Person("Forty-two"))
      store.put(7, new Person("Seven"))
      const keys: number[] = []

      store.forEach(
        onEntry(keyTypes.decoded(z.number()), person, (key, _p) => keys.push(key)),
      )

      // '{"json":42}' sorts before '{"json":7}'
      expect(keys).toEqual([42, 7])
    })

    it("rejects a callback without parameters before reading", () => {
      const view = vi.spyOn(engine, "view")

      expect(() => store.forEach(onValue(person, () => undefined))).toThrow(InvalidCallbackError)
      expect(view).not.toHaveBeenCalled()
    })

    it("rejects an entry callback that ignores the value", () => {
      expect(() => store.forEach(onEntry(keyTypes.text, person, (_key) => undefined))).toThrow(
        "entry callback must declare exactly 2 parameters, got 1",
      )
    })

    it("stops at the first callback error and rethrows it unchanged", () => {
      store.put("a", new Person("A"))
      store.put("b", new Person("B"))
      const boom = new Error("boom")
      const seen: string[] = []

      const err = thrownBy(() =>
        store.forEach(
          onValue(person, (p) => {
            seen.push(p.name)
            throw boom
          }),
        ),
      )

      expect(err).toBe(boom)
      expect(seen).toEqual(["A"])
    })

    it("stops at the first value that does not decode", () => {
      store.put("a", new Person("A"))
      store.put("b", "not a person")
      store.put("c", new Person("C"))
      const seen: string[] = []

      expect(() => store.forEach(onValue(person, (p) => seen.push(p.name)))).toThrow(
        UnmarshalError,
      )
      expect(seen).toEqual(["A"])
    })
  })

  describe("deleteAll", () => {
    it("empties the store", () => {
      store.put("ada", new Person("Ada"))
      store.put("bob", new Person("Bob"))

      store.deleteAll()

      const seen: Person[] = []
      store.forEach(onValue(person, (p) => seen.push(p)))
      expect(seen).toEqual([])
      expect(() => store.get("ada", person)).toThrow(NotFoundError)
    })

    it("leaves nothing to pull", () => {
      store.put("ada", new Person("Ada"))

      store.deleteAll()

      expect(() => store.pull("ada", person)).toThrow(NotFoundError)
      expect(store.has("ada")).toBe(false)
    })

    it("lets the store be written again", () => {
      store.put("ada", new Person("Ada"))
      store.deleteAll()

      store.put("bob", new Person("Bob"))

      expect(store.pull("bob", person)).toEqual(new Person("Bob"))
    })

    it("succeeds on a store that was never written", () => {
      expect(() => store.deleteAll()).not.toThrow()
    })

    it("removes nested stores with it", () => {
      const vip = store.nested("vip")
      vip.put("ada", new Person("Ada"))

      store.deleteAll()

      expect(vip.has("ada")).toBe(false)
    })
  })

  describe("nested", () => {
    it("keeps records of parent and child apart", () => {
      const vip = store.nested("vip")
      store.put("a", new Person("Parent"))
      vip.put("a", new Person("Child"))

      const names: string[] = []
      store.forEach(onValue(person, (p) => names.push(p.name)))

      expect(vip.path).toEqual(["people", "vip"])
      expect(store.get("a", person).name).toBe("Parent")
      expect(vip.get("a", person).name).toBe("Child")
      expect(names).toEqual(["Parent"])
    })

    it("leaves the parent alone when the child is cleared", () => {
      const vip = store.nested("vip")
      store.put("a", new Person("Parent"))
      vip.put("a", new Person("Child"))

      vip.deleteAll()

      expect(store.get("a", person).name).toBe("Parent")
      expect(vip.has("a")).toBe(false)
    })
  })

  describe("bucket names", () => {
    it("refuses the bucket holding codec fingerprints", () => {
      expect(() => createJsonStore({ engine, bucket: CODEC_BUCKET })).toThrow(StorageError)
    })

    it("refuses empty names", () => {
      expect(() => createJsonStore({ engine, bucket: "" })).toThrow("invalid bucket path")
      expect(() => store.nested("")).toThrow("invalid bucket path: empty segment")
    })
  })

  describe("codec guard", () => {
    it("refuses a bucket written with another codec", () => {
      store.put("ada", new Person("Ada"))
      const binary = createBinaryStore({ engine, bucket: "people" })

      const err = thrownBy(() => binary.get("ada", person))

      expect(err).toBeInstanceOf(CodecMismatchError)
      expect(err).toBeInstanceOf(UnmarshalError)
      expect(() => binary.put("bob", new Person("Bob"))).toThrow(CodecMismatchError)
      expect(() => binary.has("ada")).toThrow(
        "bucket people was written with codec json/1, not binary/1",
      )
    })

    it("does not record anything when the write fails", () => {
      const binary = createBinaryStore({ engine, bucket: "people" })
      expect(() => binary.put("x", new Stranger("Eve"))).toThrow(MarshalError)

      store.put("ada", new Person("Ada"))

      expect(store.get("ada", person).name).toBe("Ada")
    })

    it("lets an unguarded store read with the wrong codec", () => {
      store.put("ada", new Person("Ada"))
      const binary = createBinaryStore({ engine, bucket: "people", guardCodec: false })

      const err = thrownBy(() => binary.get("ada", person))

      expect(err).toBeInstanceOf(UnmarshalError)
      expect(err).not.toBeInstanceOf(CodecMismatchError)
    })

    it("forgets the codec once the bucket is cleared", () => {
      store.nested("vip").put("ada", new Person("Ada"))
      store.deleteAll()

      const binary = createBinaryStore({ engine, bucket: ["people", "vip"] })
      binary.put("ada", new Person("Ada", 36))

      expect(binary.get("ada", person)).toEqual(new Person("Ada", 36))
    })

    it("guards nested buckets separately from their parent", () => {
      store.put("ada", new Person("Ada"))
      const binaryChild = createBinaryStore({ engine, bucket: ["people", "vip"] })

      binaryChild.put("bob", new Person("Bob"))

      expect(binaryChild.get("bob", person).name).toBe("Bob")
    })
  })

  it("stores text as given by the codec", () => {
    store.put("note", "hello")

    const raw = engine.view((tx) => tx.bucket(["people"])?.get(utf8("note")))

    expect(raw && text(raw)).toBe('{"json":"hello"}\n')
  })
})
