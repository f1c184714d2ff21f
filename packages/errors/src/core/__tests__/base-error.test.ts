import { BaseError, serializeError } from "../base-error"

class RecordMissingError extends BaseError<"record_missing"> {
  constructor(bucket: string) {
    super(`No record in ${bucket}`, { code: "record_missing", context: { bucket } })
  }
}

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("applies defaults", () => {
      const err = new BaseError("boom", { code: "test_error" })

      expect(err.message).toBe("boom")
      expect(err.code).toBe("test_error")
      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("names the error after the concrete subclass", () => {
      const err = new RecordMissingError("people")

      expect(err.name).toBe("RecordMissingError")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
    })

    it("freezes a copy of the context", () => {
      const context = { bucket: "people" }
      const err = new BaseError("x", { code: "test", context })

      context.bucket = "changed"

      expect(err.context).toEqual({ bucket: "people" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("disk full")
      const err = new BaseError("write failed", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })
  })

  describe("toJSON", () => {
    it("returns the serialized form", () => {
      const err = new RecordMissingError("people")

      expect(err.toJSON()).toEqual({
        name: "RecordMissingError",
        code: "record_missing",
        message: "No record in people",
        context: { bucket: "people" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes the cause chain", () => {
    const root = new Error("root cause")
    const outer = new BaseError("outer", { code: "outer", cause: root })

    const serialized = serializeError(outer)

    expect(serialized.cause?.code).toBe("unknown")
    expect(serialized.cause?.message).toBe("root cause")
  })

  it("omits stack unless requested", () => {
    const err = new BaseError("x", { code: "test" })

    expect("stack" in serializeError(err)).toBe(false)
    expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
  })

  it("marks plain errors as non-operational", () => {
    const serialized = serializeError(new TypeError("not a function"))

    expect(serialized).toMatchObject({
      name: "TypeError",
      code: "unknown",
      isOperational: false,
    })
  })

  it("wraps thrown strings and objects", () => {
    expect(serializeError("bad").message).toBe("bad")
    expect(serializeError({ a: 1 }).context).toEqual({ value: { a: 1 } })
  })

  it("stops following self-referencing causes", () => {
    const err = new Error("loop")
    Object.defineProperty(err, "cause", { value: err })

    const serialized = serializeError(err)

    let depth = 0
    let current: typeof serialized | undefined = serialized
    while (current) {
      depth++
      current = current.cause
    }

    expect(depth).toBe(17)
  })
})
