import type { ByteSink, ByteSource } from "./byte-io"

export interface Encoder {
  /**
   * Writes one value to the bound sink.
   *
   * @throws MarshalError when the value cannot be represented in this format.
   */
  encode(value: unknown): void
}

export interface Decoder {
  /**
   * Reads the next value from the bound source as an untyped tree.
   *
   * @throws UnmarshalError on malformed input, unknown type metadata or end of input.
   */
  decode(): unknown

  /**
   * Class names this decoder holds definitions for, in id order. Formats
   * that carry no type metadata leave it out.
   */
  knownTypes?(): readonly string[]
}

/**
 * Factory for a wire format's encoder/decoder pair.
 *
 * @remarks
 * Encoders and decoders may keep state between calls (the binary format
 * remembers which type definitions it already sent or received). A codec
 * reports whether its coders can be reused across unrelated values through
 * `reuseSafe`; only reuse-safe codecs can be pooled.
 */
export interface Codec {
  /** Format name, e.g. "binary", "json". */
  readonly name: string

  /**
   * Identifies the persisted byte layout. Two codecs with the same
   * fingerprint read each other's output.
   */
  readonly fingerprint: string

  readonly reuseSafe: boolean

  newEncoder(sink: ByteSink): Encoder
  newDecoder(source: ByteSource): Decoder

  /**
   * Hands an encoder or decoder obtained from this codec back for reuse.
   * Only recycling codecs implement it; callers invoke it when present.
   */
  release?(coder: Encoder | Decoder): void
}

/**
 * A codec whose coders hold no state that changes observable output, so they
 * can be recycled between unrelated values.
 */
export type ReuseSafeCodec = Codec & { readonly reuseSafe: true }
