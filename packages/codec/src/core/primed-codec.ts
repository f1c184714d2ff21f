import { createHash } from "node:crypto"
import type { Codec, Decoder, Encoder, ReuseSafeCodec } from "../ports/codec"
import type { ByteSink, ByteSource } from "../ports/byte-io"
import { PrimeError } from "./codec-errors"
import { ByteBuffer } from "./io/byte-buffer"
import { ByteReader } from "./io/byte-reader"
import { DelegatingSink, DelegatingSource } from "./io/delegating"
import { discardSink } from "./io/discard"

const SNAPSHOT_HASH_CHARS = 16

/**
 * Wraps a codec so that every encoder and decoder starts out having already
 * seen a fixed list of sample values.
 *
 * @remarks
 * For formats that send type metadata once per coder, this moves the cost of
 * describing the sample types out of every stored value. The samples are
 * encoded once at creation into an immutable snapshot; each decoder replays
 * that snapshot and each encoder re-encodes the samples into a discarding
 * sink before being pointed at the caller's sink.
 *
 * Data written by a primed codec can only be read by a codec primed with the
 * same sample types in the same order. The `fingerprint` is derived from the
 * type definitions the samples leave on a decoder, or from the snapshot for
 * formats whose decoders report none.
 *
 * Coders stay reuse-safe only while they encode values whose types were all
 * among the samples.
 */
export class PrimedCodec implements ReuseSafeCodec {
  readonly reuseSafe = true
  readonly name: string
  readonly fingerprint: string

  private constructor(
    private readonly base: Codec,
    private readonly samples: readonly unknown[],
    private readonly snapshot: Uint8Array,
    layout: string | Uint8Array,
  ) {
    this.name = base.name

    const digest = createHash("sha256").update(layout).digest("hex")
    this.fingerprint = `${base.fingerprint}+primed:${digest.slice(0, SNAPSHOT_HASH_CHARS)}`
  }

  /**
   * Encodes `samples` as one list and checks it decodes again.
   *
   * @throws PrimeError when either step fails.
   */
  static create(base: Codec, samples: readonly unknown[]): PrimedCodec {
    const frozen = Object.freeze([...samples])
    const buffer = new ByteBuffer()

    let types: readonly string[] | undefined
    try {
      base.newEncoder(buffer).encode(frozen)

      const decoder = base.newDecoder(new ByteReader(buffer.bytes()))
      decoder.decode()
      types = decoder.knownTypes?.()
    } catch (err) {
      throw PrimeError.roundTripFailed(base.name, err)
    }

    const snapshot = buffer.bytes()
    const layout = types === undefined ? snapshot : JSON.stringify(types)

    return new PrimedCodec(base, frozen, snapshot, layout)
  }

  newEncoder(sink: ByteSink): Encoder {
    const delegate = new DelegatingSink(discardSink)
    const encoder = this.base.newEncoder(delegate)

    encoder.encode(this.samples)
    delegate.retarget(sink)

    return encoder
  }

  newDecoder(source: ByteSource): Decoder {
    const delegate = new DelegatingSource(new ByteReader(this.snapshot))
    const decoder = this.base.newDecoder(delegate)

    decoder.decode()
    delegate.retarget(source)

    return decoder
  }
}
