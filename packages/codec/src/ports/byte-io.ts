/**
 * Destination an {@link Encoder} writes to.
 */
export interface ByteSink {
  write(chunk: Uint8Array): void
}

/**
 * Input a {@link Decoder} reads from.
 *
 * @remarks
 * Decoders must never read past the end of the value they are decoding, so a
 * source can be swapped between two `decode()` calls without losing bytes.
 */
export interface ByteSource {
  /**
   * Reads at most `length` bytes. A shorter result means end of input.
   */
  read(length: number): Uint8Array

  /**
   * Reads up to and including `delimiter`, or whatever is left when the
   * delimiter never appears. An empty result means end of input.
   */
  readUntil(delimiter: number): Uint8Array
}
