import type { Codec } from "@larder/codec"
import { isAppError, serializeError } from "@larder/errors"
import { createNullLogger, type Logger } from "@larder/logger"
import type {
  BucketPath,
  ReadTransaction,
  TransactionalEngine,
  WriteTransaction,
} from "../ports/engine"
import type { StoreKey } from "../ports/key-type"
import type { ValueType } from "../ports/value-type"
import { bucketId } from "./bucket-path"
import { CODEC_BUCKET, CodecGuard } from "./codec-guard"
import { createDispatcher, type ForEachCallback } from "./dispatcher"
import { deriveKey } from "./keys"
import { marshal, unmarshal } from "./marshal"
import { CodecMismatchError, NotFoundError, StorageError } from "./store-errors"

export type StoreDeps = {
  engine: TransactionalEngine
  codec: Codec
  logger?: Logger
}

export type StoreOptions = {
  /** Bucket name, or path of a nested bucket. */
  bucket: string | BucketPath

  /**
   * Record the codec fingerprint on first write and refuse reads and writes
   * through a codec with another fingerprint. Default: true
   */
  guardCodec?: boolean
}

/** Carries an error thrown by a forEach callback through the engine unchanged. */
class CallbackFailure extends Error {
  constructor(readonly error: unknown) {
    super("forEach callback failed")
  }
}

/**
 * Typed values in one bucket of a transactional engine.
 *
 * @remarks
 * Every operation is synchronous and runs in its own engine transaction.
 * Values are encoded before a write transaction opens and decoded after a
 * read transaction closes, except in `forEach`, which decodes each record
 * while scanning.
 */
export class Store {
  readonly path: BucketPath

  private readonly guard: CodecGuard
  private readonly guarded: boolean
  private readonly log: Logger

  constructor(
    private readonly deps: StoreDeps,
    private readonly opts: StoreOptions,
  ) {
    this.path = typeof opts.bucket === "string" ? [opts.bucket] : [...opts.bucket]
    bucketId(this.path)

    if (this.path[0] === CODEC_BUCKET) {
      throw StorageError.invalidBucketPath(`${CODEC_BUCKET} is reserved`)
    }

    this.guard = new CodecGuard(this.path, deps.codec.fingerprint)
    this.guarded = opts.guardCodec ?? true
    this.log = (deps.logger ?? createNullLogger()).child({
      module: "store",
      bucket: this.path.join("/"),
      codec: deps.codec.fingerprint,
    })
  }

  /**
   * Stores `value` under `key`, creating the bucket if needed.
   *
   * @throws MarshalError before any transaction when `value` cannot be encoded.
   */
  put(key: StoreKey, value: unknown): void {
    const keyBytes = this.keyOf(key)
    const valueBytes = marshal(this.deps.codec, value)

    this.write("put", (tx) => {
      if (this.guarded) this.guard.checkWrite(tx)
      tx.createBucketIfNotExists(this.path).put(keyBytes, valueBytes)
    })

    this.log.debug("put", { op: "put", keyBytes: keyBytes.length, valueBytes: valueBytes.length })
  }

  /**
   * @throws NotFoundError when the bucket or key is absent.
   * @throws UnmarshalError when the stored value does not decode into `type`.
   */
  get<T>(key: StoreKey, type: ValueType<T>): T {
    const keyBytes = this.keyOf(key)

    const stored = this.read("get", (tx) => {
      this.checkRead(tx)

      const bucket = tx.bucket(this.path)
      if (!bucket) throw NotFoundError.bucket(this.path)

      const value = bucket.get(keyBytes)
      if (!value) throw NotFoundError.key(this.path)

      return value.slice()
    })

    this.log.debug("get", { op: "get", keyBytes: keyBytes.length, valueBytes: stored.length })
    return this.decode("get", stored, type)
  }

  /**
   * Reads and removes `key` in one transaction. The value is decoded after
   * the removal committed.
   */
  pull<T>(key: StoreKey, type: ValueType<T>): T {
    const keyBytes = this.keyOf(key)

    const stored = this.write("pull", (tx) => {
      this.checkRead(tx)

      const bucket = tx.bucket(this.path)
      if (!bucket) throw NotFoundError.bucket(this.path)

      const value = bucket.get(keyBytes)
      if (!value) throw NotFoundError.key(this.path)

      const copy = value.slice()
      bucket.delete(keyBytes)
      return copy
    })

    this.log.debug("pull", { op: "pull", keyBytes: keyBytes.length, valueBytes: stored.length })
    return this.decode("pull", stored, type)
  }

  /** Removes `key`; absent keys are ignored. */
  delete(key: StoreKey): void {
    const keyBytes = this.keyOf(key)

    this.write("delete", (tx) => {
      this.checkRead(tx)
      tx.bucket(this.path)?.delete(keyBytes)
    })

    this.log.debug("delete", { op: "delete", keyBytes: keyBytes.length })
  }

  has(key: StoreKey): boolean {
    const keyBytes = this.keyOf(key)

    return this.read("has", (tx) => {
      this.checkRead(tx)
      return tx.bucket(this.path)?.get(keyBytes) !== undefined
    })
  }

  /**
   * Decodes every record in key order and hands it to `callback`.
   *
   * @remarks
   * The callback is checked before the bucket is read. A missing bucket is an
   * empty store. The first decode failure, or the first error thrown by the
   * callback, stops the scan and is rethrown.
   *
   * @throws InvalidCallbackError
   */
  forEach<K, V>(callback: ForEachCallback<K, V>): void {
    const dispatch = createDispatcher(callback, (bytes, type) =>
      this.decode("forEach", bytes, type),
    )

    let visited = 0

    this.read("forEach", (tx) => {
      this.checkRead(tx)

      tx.bucket(this.path)?.forEach((key, value) => {
        try {
          dispatch(key, value)
        } catch (err) {
          throw new CallbackFailure(err)
        }
        visited++
      })
    })

    this.log.debug("forEach", { op: "forEach", visited })
  }

  /** Drops the bucket and every bucket nested in it. */
  deleteAll(): void {
    const existed = this.write("deleteAll", (tx) => {
      this.guard.clear(tx)
      return tx.deleteBucket(this.path)
    })

    this.log.debug("deleteAll", { op: "deleteAll", existed })
  }

  /**
   * Store over the bucket `name` nested in this one, sharing engine, codec
   * and options. Records of the two stores are independent; `deleteAll` here
   * also removes the nested bucket.
   */
  nested(name: string): Store {
    return new Store(this.deps, { ...this.opts, bucket: [...this.path, name] })
  }

  private keyOf(key: StoreKey): Uint8Array {
    return deriveKey(this.deps.codec, key)
  }

  private decode<T>(op: string, bytes: Uint8Array, type: ValueType<T>): T {
    try {
      return unmarshal(this.deps.codec, bytes, type)
    } catch (err) {
      this.log.debug("decode failed", { op, err: serializeError(err) })
      throw err
    }
  }

  private checkRead(tx: ReadTransaction | WriteTransaction): void {
    if (this.guarded) this.guard.checkRead(tx)
  }

  private read<T>(op: string, fn: (tx: ReadTransaction) => T): T {
    try {
      return this.deps.engine.view(fn)
    } catch (err) {
      throw this.failure(op, err)
    }
  }

  private write<T>(op: string, fn: (tx: WriteTransaction) => T): T {
    try {
      return this.deps.engine.update(fn)
    } catch (err) {
      throw this.failure(op, err)
    }
  }

  private failure(op: string, err: unknown): unknown {
    if (err instanceof CallbackFailure) return err.error

    if (err instanceof CodecMismatchError) {
      this.log.warn("codec mismatch", { op, err: serializeError(err) })
      return err
    }

    if (isAppError(err)) return err

    const wrapped = StorageError.from(op, err)
    this.log.error("storage engine failed", { op, err: serializeError(wrapped) })
    return wrapped
  }
}
