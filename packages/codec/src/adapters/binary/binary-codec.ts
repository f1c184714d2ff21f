import { decode, encode, ExtensionCodec } from "@msgpack/msgpack"
import { MarshalError, UnmarshalError } from "../../core/codec-errors"
import { defaultTypeRegistry, type TypeRegistry } from "../../core/registry/type-registry"
import type { ByteSink, ByteSource } from "../../ports/byte-io"
import type { Codec, Decoder, Encoder } from "../../ports/codec"
import { encodeUvarint, readUvarint } from "./uvarint"

const FORMAT = "binary"

// Frame kinds. A stream is a sequence of `uvarint(length) ‖ msgpack payload`.
const FRAME_TYPE = 0
const FRAME_VALUE = 1

// MessagePack extension carrying `[typeId, fields]` for registered classes.
const TYPED_EXT = 0x01

type TypeId = number

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function className(value: object): string {
  return Reflect.getPrototypeOf(value)?.constructor.name || "anonymous"
}

function encoderOnly(): never {
  throw new Error("extension decoding is not available on an encoder")
}

class BinaryEncoder implements Encoder {
  private readonly sent = new Map<string, TypeId>()
  private readonly pending = new Map<string, TypeId>()
  private readonly extensions = new ExtensionCodec()

  constructor(
    private readonly sink: ByteSink,
    private readonly registry: TypeRegistry,
  ) {
    this.extensions.register({
      type: TYPED_EXT,
      encode: (input) => this.encodeTyped(input),
      decode: encoderOnly,
    })
  }

  encode(value: unknown): void {
    this.pending.clear()

    let body: Uint8Array
    try {
      body = this.pack([FRAME_VALUE, value])
    } catch (err) {
      this.pending.clear()
      throw MarshalError.from(FORMAT, err)
    }

    // Definitions become part of this encoder's state only once the value
    // itself encoded.
    for (const [name, id] of this.pending) {
      this.writeFrame(this.pack([FRAME_TYPE, id, name]))
      this.sent.set(name, id)
    }
    this.pending.clear()

    this.writeFrame(body)
  }

  private pack(value: unknown): Uint8Array {
    return encode(value, { extensionCodec: this.extensions, ignoreUndefined: true })
  }

  private encodeTyped(input: unknown): Uint8Array | null {
    if (typeof input !== "object" || input === null) return null
    if (Array.isArray(input) || ArrayBuffer.isView(input) || isPlainObject(input)) {
      return null
    }

    const name = this.registry.nameOf(input)
    if (name === undefined) {
      throw MarshalError.unregisteredType(FORMAT, className(input))
    }

    const fields: Record<string, unknown> = { ...input }
    return this.pack([this.typeId(name), fields])
  }

  private typeId(name: string): TypeId {
    const known = this.sent.get(name) ?? this.pending.get(name)
    if (known !== undefined) return known

    const id = this.sent.size + this.pending.size + 1
    this.pending.set(name, id)
    return id
  }

  private writeFrame(payload: Uint8Array): void {
    this.sink.write(encodeUvarint(payload.length))
    this.sink.write(payload)
  }
}

class BinaryDecoder implements Decoder {
  private readonly types = new Map<TypeId, string>()
  private readonly extensions = new ExtensionCodec()

  constructor(
    private readonly source: ByteSource,
    private readonly registry: TypeRegistry,
  ) {
    this.extensions.register({
      type: TYPED_EXT,
      encode: () => null,
      decode: (data) => this.decodeTyped(data),
    })
  }

  decode(): unknown {
    for (;;) {
      const frame = this.readFrame()

      if (frame[0] === FRAME_VALUE && frame.length === 2) {
        return frame[1]
      }

      if (frame[0] === FRAME_TYPE) {
        this.define(frame)
        continue
      }

      throw UnmarshalError.malformed(FORMAT, "unknown frame kind")
    }
  }

  knownTypes(): readonly string[] {
    return [...this.types]
      .sort(([a], [b]) => a - b)
      .map(([, name]) => name)
  }

  private define(frame: readonly unknown[]): void {
    const [, id, name] = frame

    if (typeof id !== "number" || typeof name !== "string" || frame.length !== 3) {
      throw UnmarshalError.malformed(FORMAT, "invalid type definition")
    }

    if (this.types.has(id)) throw UnmarshalError.duplicateType(FORMAT, id)

    this.types.set(id, name)
  }

  private readFrame(): readonly unknown[] {
    let length: number | undefined
    try {
      length = readUvarint(this.source)
    } catch (err) {
      throw UnmarshalError.from(FORMAT, err)
    }

    if (length === undefined) throw UnmarshalError.endOfInput(FORMAT)

    const payload = this.source.read(length)
    if (payload.length < length) throw UnmarshalError.endOfInput(FORMAT)

    let frame: unknown
    try {
      frame = decode(payload, { extensionCodec: this.extensions })
    } catch (err) {
      throw UnmarshalError.from(FORMAT, err)
    }

    if (!Array.isArray(frame)) {
      throw UnmarshalError.malformed(FORMAT, "frame is not a list")
    }

    return frame
  }

  private decodeTyped(data: Uint8Array): object {
    const decoded: unknown = decode(data, { extensionCodec: this.extensions })

    if (!Array.isArray(decoded) || decoded.length !== 2) {
      throw UnmarshalError.malformed(FORMAT, "invalid typed value")
    }

    const id: unknown = decoded[0]
    const fields: unknown = decoded[1]

    if (typeof id !== "number" || !isRecord(fields)) {
      throw UnmarshalError.malformed(FORMAT, "invalid typed value")
    }

    const name = this.types.get(id)
    if (name === undefined) throw UnmarshalError.unknownTypeId(FORMAT, id)

    const instance = this.registry.instantiate(name, fields)
    if (instance === undefined) throw UnmarshalError.unregisteredType(FORMAT, name)

    return instance
  }
}

export type BinaryCodecOptions = {
  /** Where class names are resolved. Defaults to the process-wide registry. */
  registry?: TypeRegistry
}

/**
 * Length-delimited, self-describing binary format on MessagePack.
 *
 * @remarks
 * Instances of registered classes are written as a type id plus their own
 * enumerable fields. Ids are assigned per encoder in encounter order, and the
 * first use of a type on an encoder is preceded by a definition frame binding
 * the id to the class name. Encoders and decoders therefore accumulate state
 * and are not reuse-safe; wrap the codec in a `PrimedCodec` before pooling it.
 *
 * Plain objects, arrays, strings, numbers, booleans, `null`, `Date` and
 * `Uint8Array` are encoded natively. `undefined` object fields are dropped.
 */
export class BinaryCodec implements Codec {
  readonly name = FORMAT
  readonly fingerprint = "binary/1"
  readonly reuseSafe = false

  private readonly registry: TypeRegistry

  constructor(opts: BinaryCodecOptions = {}) {
    this.registry = opts.registry ?? defaultTypeRegistry
  }

  newEncoder(sink: ByteSink): Encoder {
    return new BinaryEncoder(sink, this.registry)
  }

  newDecoder(source: ByteSource): Decoder {
    return new BinaryDecoder(source, this.registry)
  }
}
