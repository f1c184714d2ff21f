import { UnmarshalError } from "../../core/codec-errors"
import { ByteReader } from "../../core/io/byte-reader"
import { decodeAll, encodeAll, roundTrip, utf8 } from "../../tests/utils/coding"
import type { Codec } from "../codec"

export function describeCodecContract(name: string, makeCodec: () => Codec) {
  describe(`Codec contract: ${name}`, () => {
    let codec: Codec

    beforeEach(() => {
      codec = makeCodec()
    })

    it("has a name and a fingerprint", () => {
      expect(codec.name).not.toBe("")
      expect(codec.fingerprint).not.toBe("")
    })

    it("round-trips a string", () => {
      expect(roundTrip(codec, "hello")).toBe("hello")
    })

    it("round-trips a plain object of strings", () => {
      expect(roundTrip(codec, { name: "Ada", city: "London" })).toEqual({
        name: "Ada",
        city: "London",
      })
    })

    it("decodes values in the order one encoder wrote them", () => {
      const bytes = encodeAll(codec, ["first", { k: "second" }, "third"])

      expect(decodeAll(codec, bytes, 3)).toEqual(["first", { k: "second" }, "third"])
    })

    it("decodes each value into a fresh object", () => {
      const bytes = encodeAll(codec, [{ k: "v" }])

      const a = decodeAll(codec, bytes, 1)[0]
      const b = decodeAll(codec, bytes, 1)[0]

      expect(a).toEqual(b)
      expect(a).not.toBe(b)
    })

    it("throws UnmarshalError at end of input", () => {
      const decoder = codec.newDecoder(new ByteReader(new Uint8Array(0)))

      expect(() => decoder.decode()).toThrow(UnmarshalError)
    })

    it("throws UnmarshalError past the last value", () => {
      const decoder = codec.newDecoder(new ByteReader(encodeAll(codec, ["only"])))

      expect(decoder.decode()).toBe("only")
      expect(() => decoder.decode()).toThrow(UnmarshalError)
    })

    it("throws UnmarshalError on garbage", () => {
      const decoder = codec.newDecoder(new ByteReader(utf8("not a frame\n")))

      expect(() => decoder.decode()).toThrow(UnmarshalError)
    })
  })
}
