import { UnmarshalError } from "@larder/codec"
import { isAppError } from "@larder/errors"
import {
  CodecMismatchError,
  InvalidCallbackError,
  NotFoundError,
  StorageError,
} from "../store-errors"

describe("store errors", () => {
  it("names the bucket a lookup missed", () => {
    const err = NotFoundError.key(["people", "vip"])

    expect(err.message).toBe("key not found in bucket people/vip")
    expect(err.code).toBe("not_found")
    expect(err.context).toEqual({ bucket: "people/vip" })
  })

  it("marks callback errors as programming errors", () => {
    const err = InvalidCallbackError.unknownKind()

    expect(isAppError(err)).toBe(true)
    expect(err.isOperational).toBe(false)
  })

  describe("StorageError.from", () => {
    it.each(["SQLITE_BUSY", "SQLITE_LOCKED"])("marks %s as retryable", (code) => {
      const err = StorageError.from("put", Object.assign(new Error("locked"), { code }))

      expect(err.isRetryable).toBe(true)
      expect(err.context).toEqual({ op: "put", engineCode: code })
    })

    it("does not retry other failures", () => {
      const cause = Object.assign(new Error("disk I/O error"), { code: "SQLITE_IOERR" })

      const err = StorageError.from("put", cause)

      expect(err.isRetryable).toBe(false)
      expect(err.cause).toBe(cause)
    })

    it("leaves out the engine code when there is none", () => {
      expect(StorageError.from("get", new Error("x")).context).toEqual({ op: "get" })
      expect(StorageError.from("get", "x").context).toEqual({ op: "get" })
    })

    it("returns storage errors unchanged", () => {
      const err = StorageError.closed()

      expect(StorageError.from("get", err)).toBe(err)
    })
  })

  it("reports a codec mismatch as a decode failure", () => {
    const err = CodecMismatchError.detected(["people"], "json/1", "xml/1")

    expect(err).toBeInstanceOf(UnmarshalError)
    expect(err.code).toBe("codec_mismatch")
    expect(err.message).toBe("bucket people was written with codec json/1, not xml/1")
    expect(err.context).toEqual({ bucket: "people", stored: "json/1", current: "xml/1" })
  })
})
