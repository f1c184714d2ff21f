/**
 * Location of a bucket. `["a"]` is a top-level bucket, `["a", "b"]` the
 * bucket `b` nested inside `a`.
 */
export type BucketPath = readonly string[]

export interface ReadBucket {
  /**
   * Stored bytes for `key`. The returned array is only valid inside the
   * transaction that produced it.
   */
  get(key: Uint8Array): Uint8Array | undefined

  /**
   * Visits every record of this bucket (not of nested buckets) in byte order
   * of the keys. A throw from `visit` stops the scan and propagates.
   */
  forEach(visit: (key: Uint8Array, value: Uint8Array) => void): void
}

export interface Bucket extends ReadBucket {
  /** @throws StorageError when `key` is empty. */
  put(key: Uint8Array, value: Uint8Array): void

  /** Removing an absent key is a no-op. */
  delete(key: Uint8Array): void
}

export interface ReadTransaction {
  bucket(path: BucketPath): ReadBucket | undefined
}

export interface WriteTransaction {
  bucket(path: BucketPath): Bucket | undefined

  /** Creates the bucket and any missing parents. */
  createBucketIfNotExists(path: BucketPath): Bucket

  /**
   * Removes the bucket with its records and nested buckets.
   * Returns false when there was nothing to remove.
   */
  deleteBucket(path: BucketPath): boolean
}

/**
 * Embedded, single-writer, transactional, ordered key-value engine.
 *
 * @remarks
 * - `update` commits when `fn` returns and rolls back when it throws.
 * - `view` sees a consistent snapshot and never writes.
 * - Transactions are synchronous; `fn` must not return a promise.
 * - Starting an `update` inside another transaction throws instead of
 *   deadlocking.
 * - Transaction and bucket handles must not be used after `fn` returns.
 */
export interface TransactionalEngine {
  update<T>(fn: (tx: WriteTransaction) => T): T
  view<T>(fn: (tx: ReadTransaction) => T): T
  close(): void
}
