import { text, utf8 } from "../../../tests/utils/fixtures"
import { MemoryEngine } from "../memory-engine"

describe("MemoryEngine (behavior)", () => {
  let engine: MemoryEngine

  beforeEach(() => {
    engine = new MemoryEngine()
    engine.update((tx) => tx.createBucketIfNotExists(["a"]).put(utf8("k"), utf8("v1")))
  })

  it("keeps uncommitted writes out of reads started during the update", () => {
    const seen = engine.update((tx) => {
      tx.bucket(["a"])?.put(utf8("k"), utf8("v2"))

      return engine.view((read) => {
        const value = read.bucket(["a"])?.get(utf8("k"))
        return value && text(value)
      })
    })

    expect(seen).toBe("v1")
  })

  it("does not change the committed state when a draft bucket is deleted and rolled back", () => {
    expect(() =>
      engine.update((tx) => {
        tx.deleteBucket(["a"])
        throw new Error("abort")
      }),
    ).toThrow("abort")

    const value = engine.view((tx) => tx.bucket(["a"])?.get(utf8("k")))
    expect(value && text(value)).toBe("v1")
  })

  it("refuses a bucket handle whose bucket was deleted in the same update", () => {
    expect(() =>
      engine.update((tx) => {
        const bucket = tx.createBucketIfNotExists(["a"])
        tx.deleteBucket(["a"])
        bucket.put(utf8("k"), utf8("v2"))
      }),
    ).toThrow("bucket no longer exists: a")
  })

  it("drops every bucket on close", () => {
    engine.close()

    expect(() => engine.update(() => undefined)).toThrow("engine is closed")
  })
})
