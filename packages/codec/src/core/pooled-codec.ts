import type { Codec, Decoder, Encoder, ReuseSafeCodec } from "../ports/codec"
import type { ByteSink, ByteSource } from "../ports/byte-io"
import { PoolError } from "./codec-errors"
import { DelegatingSink, DelegatingSource } from "./io/delegating"
import { discardSink, emptySource } from "./io/discard"
import { ResourcePool, type PoolStats } from "./pool/resource-pool"

class PooledEncoder implements Encoder {
  private readonly sink = new DelegatingSink(discardSink)
  private readonly inner: Encoder

  constructor(base: Codec) {
    this.inner = base.newEncoder(this.sink)
  }

  bind(sink: ByteSink): this {
    this.sink.retarget(sink)
    return this
  }

  detach(): void {
    this.sink.retarget(discardSink)
  }

  encode(value: unknown): void {
    this.inner.encode(value)
  }
}

class PooledDecoder implements Decoder {
  private readonly source = new DelegatingSource(emptySource)
  private readonly inner: Decoder

  constructor(base: Codec) {
    this.inner = base.newDecoder(this.source)
  }

  bind(source: ByteSource): this {
    this.source.retarget(source)
    return this
  }

  detach(): void {
    this.source.retarget(emptySource)
  }

  decode(): unknown {
    return this.inner.decode()
  }
}

export type PooledCodecStats = Readonly<{
  encoders: PoolStats
  decoders: PoolStats
}>

/**
 * Recycles encoders and decoders of a reuse-safe codec.
 *
 * Coders keep their format state across uses; only the sink or source they
 * are bound to changes. Callers hand each coder back with `release` once
 * they are done with it.
 */
export class PooledCodec implements ReuseSafeCodec {
  readonly reuseSafe = true
  readonly name: string
  readonly fingerprint: string

  private readonly encoders: ResourcePool<PooledEncoder>
  private readonly decoders: ResourcePool<PooledDecoder>

  constructor(base: ReuseSafeCodec) {
    this.name = base.name
    this.fingerprint = base.fingerprint
    this.encoders = new ResourcePool(`${base.name}:encoders`, () => new PooledEncoder(base))
    this.decoders = new ResourcePool(`${base.name}:decoders`, () => new PooledDecoder(base))
  }

  newEncoder(sink: ByteSink): Encoder {
    return this.encoders.acquire().bind(sink)
  }

  newDecoder(source: ByteSource): Decoder {
    return this.decoders.acquire().bind(source)
  }

  /**
   * @throws PoolError when `coder` was not handed out by this codec or was
   * already released.
   */
  release(coder: Encoder | Decoder): void {
    if (this.encoders.owns(coder)) {
      this.encoders.release(coder)
      coder.detach()
      return
    }

    if (this.decoders.owns(coder)) {
      this.decoders.release(coder)
      coder.detach()
      return
    }

    throw PoolError.foreign(this.name)
  }

  stats(): PooledCodecStats {
    return { encoders: this.encoders.stats(), decoders: this.decoders.stats() }
  }
}
