import superjson from "superjson"
import { MarshalError, UnmarshalError } from "../../core/codec-errors"
import { readLine, writeLine } from "../../core/io/line-frames"
import type { ByteSink, ByteSource } from "../../ports/byte-io"
import type { Decoder, Encoder, ReuseSafeCodec } from "../../ports/codec"

const FORMAT = "json"

/**
 * Newline-delimited JSON documents. `Date`, `Map`, `Set`, `bigint` and
 * `undefined` survive the round trip through superjson's metadata; class
 * instances come back as plain objects.
 */
export class JsonCodec implements ReuseSafeCodec {
  readonly name = FORMAT
  readonly fingerprint = "json/1"
  readonly reuseSafe = true

  newEncoder(sink: ByteSink): Encoder {
    return {
      encode(value: unknown): void {
        let text: string
        try {
          text = superjson.stringify(value)
        } catch (err) {
          throw MarshalError.from(FORMAT, err)
        }
        writeLine(sink, text)
      },
    }
  }

  newDecoder(source: ByteSource): Decoder {
    return {
      decode(): unknown {
        let line: string | undefined
        try {
          line = readLine(source)
        } catch (err) {
          throw UnmarshalError.from(FORMAT, err)
        }

        if (line === undefined) throw UnmarshalError.endOfInput(FORMAT)

        try {
          return superjson.parse<unknown>(line)
        } catch (err) {
          throw UnmarshalError.from(FORMAT, err)
        }
      },
    }
  }
}
