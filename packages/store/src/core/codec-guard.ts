import type { BucketPath, ReadTransaction, WriteTransaction } from "../ports/engine"
import { bucketId, descendantPrefix } from "./bucket-path"
import { CodecMismatchError } from "./store-errors"

/** Top-level bucket holding the codec fingerprint of every guarded store. */
export const CODEC_BUCKET = "__larder_codecs__"

const CODEC_PATH: BucketPath = [CODEC_BUCKET]

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * Records which codec wrote a bucket and refuses access through any other.
 */
export class CodecGuard {
  private readonly key: Uint8Array
  private readonly id: string
  private readonly nestedPrefix: string

  constructor(
    private readonly path: BucketPath,
    private readonly fingerprint: string,
  ) {
    this.id = bucketId(path)
    this.nestedPrefix = descendantPrefix(path)
    this.key = encoder.encode(this.id)
  }

  /** @throws CodecMismatchError */
  checkRead(tx: ReadTransaction | WriteTransaction): void {
    const stored = tx.bucket(CODEC_PATH)?.get(this.key)
    if (stored !== undefined) this.compare(decoder.decode(stored))
  }

  /** Like {@link checkRead}, and records the fingerprint on first write. */
  checkWrite(tx: WriteTransaction): void {
    const stored = tx.bucket(CODEC_PATH)?.get(this.key)

    if (stored === undefined) {
      tx.createBucketIfNotExists(CODEC_PATH).put(this.key, encoder.encode(this.fingerprint))
      return
    }

    this.compare(decoder.decode(stored))
  }

  /** Forgets the fingerprints of this bucket and of buckets nested in it. */
  clear(tx: WriteTransaction): void {
    const bucket = tx.bucket(CODEC_PATH)
    if (!bucket) return

    const doomed: Uint8Array[] = []

    bucket.forEach((key) => {
      const id = decoder.decode(key)
      if (id === this.id || id.startsWith(this.nestedPrefix)) doomed.push(key.slice())
    })

    for (const key of doomed) bucket.delete(key)
  }

  private compare(stored: string): void {
    if (stored !== this.fingerprint) {
      throw CodecMismatchError.detected(this.path, stored, this.fingerprint)
    }
  }
}
