import type { ByteSink, ByteSource } from "../../ports/byte-io"

/**
 * Sink that forwards to a target which can be swapped at any time. An
 * encoder built over it keeps its state while its output moves elsewhere.
 */
export class DelegatingSink implements ByteSink {
  constructor(private target: ByteSink) {}

  retarget(target: ByteSink): void {
    this.target = target
  }

  write(chunk: Uint8Array): void {
    this.target.write(chunk)
  }
}

/**
 * Source counterpart of {@link DelegatingSink}.
 */
export class DelegatingSource implements ByteSource {
  constructor(private target: ByteSource) {}

  retarget(target: ByteSource): void {
    this.target = target
  }

  read(length: number): Uint8Array {
    return this.target.read(length)
  }

  readUntil(delimiter: number): Uint8Array {
    return this.target.readUntil(delimiter)
  }
}
