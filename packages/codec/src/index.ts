export { BinaryCodec, type BinaryCodecOptions } from "./adapters/binary/binary-codec"
export { JsonCodec } from "./adapters/json/json-codec"
export { XmlCodec } from "./adapters/xml/xml-codec"
export {
  MarshalError,
  PoolError,
  type PoolErrorCode,
  PrimeError,
  UnmarshalError,
  type UnmarshalErrorCode,
} from "./core/codec-errors"
export { ByteBuffer } from "./core/io/byte-buffer"
export { ByteReader } from "./core/io/byte-reader"
export { DelegatingSink, DelegatingSource } from "./core/io/delegating"
export { discardSink, emptySource } from "./core/io/discard"
export { readLine, writeLine } from "./core/io/line-frames"
export { type PoolStats, ResourcePool } from "./core/pool/resource-pool"
export { PooledCodec, type PooledCodecStats } from "./core/pooled-codec"
export { PrimedCodec } from "./core/primed-codec"
export {
  type Constructor,
  defaultTypeRegistry,
  registerType,
  TypeRegistry,
} from "./core/registry/type-registry"
export type { ByteSink, ByteSource } from "./ports/byte-io"
export type { Codec, Decoder, Encoder, ReuseSafeCodec } from "./ports/codec"
