import { StorageError } from "../../core/store-errors"
import type {
  Bucket,
  BucketPath,
  ReadBucket,
  ReadTransaction,
  TransactionalEngine,
  WriteTransaction,
} from "../../ports/engine"
import { bucketId, descendantPrefix, lineage } from "../../core/bucket-path"
import { Lifetime } from "../lifetime"

type MemoryRecord = { key: Uint8Array; value: Uint8Array }

/** Records keyed by the hex form of their key; hex order is byte order. */
type Records = ReadonlyMap<string, MemoryRecord>

type Buckets = ReadonlyMap<string, Records>

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex")
}

function scan(records: Records, visit: (key: Uint8Array, value: Uint8Array) => void): void {
  const ordered = [...records.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))

  for (const hex of ordered) {
    const record = records.get(hex)
    if (record) visit(record.key, record.value)
  }
}

class MemoryReadBucket implements ReadBucket {
  constructor(
    private readonly lifetime: Lifetime,
    private readonly records: Records,
  ) {}

  get(key: Uint8Array): Uint8Array | undefined {
    this.lifetime.assertOpen()
    return this.records.get(toHex(key))?.value
  }

  forEach(visit: (key: Uint8Array, value: Uint8Array) => void): void {
    this.lifetime.assertOpen()
    scan(this.records, visit)
  }
}

class MemoryReadTransaction implements ReadTransaction {
  constructor(
    private readonly lifetime: Lifetime,
    private readonly buckets: Buckets,
  ) {}

  bucket(path: BucketPath): ReadBucket | undefined {
    this.lifetime.assertOpen()

    const records = this.buckets.get(bucketId(path))
    return records && new MemoryReadBucket(this.lifetime, records)
  }
}

/**
 * Draft of the engine state. Bucket maps are shared with the committed state
 * until first written, then copied.
 */
class MemoryWriteTransaction implements WriteTransaction {
  readonly draft: Map<string, Records>
  private readonly copies = new Map<string, Map<string, MemoryRecord>>()

  constructor(
    private readonly lifetime: Lifetime,
    committed: Buckets,
  ) {
    this.draft = new Map(committed)
  }

  bucket(path: BucketPath): Bucket | undefined {
    this.lifetime.assertOpen()

    const id = bucketId(path)
    return this.draft.has(id) ? new MemoryBucket(this, path, id) : undefined
  }

  createBucketIfNotExists(path: BucketPath): Bucket {
    this.lifetime.assertOpen()

    for (const ancestor of lineage(path)) {
      const id = bucketId(ancestor)
      if (this.draft.has(id)) continue

      const records = new Map<string, MemoryRecord>()
      this.draft.set(id, records)
      this.copies.set(id, records)
    }

    return new MemoryBucket(this, path, bucketId(path))
  }

  deleteBucket(path: BucketPath): boolean {
    this.lifetime.assertOpen()

    const id = bucketId(path)
    if (!this.draft.has(id)) return false

    const prefix = descendantPrefix(path)
    for (const other of [...this.draft.keys()]) {
      if (other !== id && !other.startsWith(prefix)) continue

      this.draft.delete(other)
      this.copies.delete(other)
    }

    return true
  }

  read(id: string, path: BucketPath): Records {
    this.lifetime.assertOpen()

    const records = this.draft.get(id)
    if (!records) throw StorageError.bucketMissing(path)
    return records
  }

  writable(id: string, path: BucketPath): Map<string, MemoryRecord> {
    const current = this.read(id, path)
    const own = this.copies.get(id)
    if (own !== undefined && own === current) return own

    const copy = new Map(current)
    this.draft.set(id, copy)
    this.copies.set(id, copy)
    return copy
  }
}

class MemoryBucket implements Bucket {
  constructor(
    private readonly tx: MemoryWriteTransaction,
    private readonly path: BucketPath,
    private readonly id: string,
  ) {}

  get(key: Uint8Array): Uint8Array | undefined {
    return this.tx.read(this.id, this.path).get(toHex(key))?.value
  }

  forEach(visit: (key: Uint8Array, value: Uint8Array) => void): void {
    scan(this.tx.read(this.id, this.path), visit)
  }

  put(key: Uint8Array, value: Uint8Array): void {
    if (key.length === 0) throw StorageError.keyRequired()

    this.tx.writable(this.id, this.path).set(toHex(key), {
      key: key.slice(),
      value: value.slice(),
    })
  }

  delete(key: Uint8Array): void {
    this.tx.writable(this.id, this.path).delete(toHex(key))
  }
}

/**
 * In-process engine. Write transactions work on a copy-on-write draft that
 * replaces the committed state only when `fn` returns.
 */
export class MemoryEngine implements TransactionalEngine {
  private committed: Buckets = new Map()
  private depth = 0
  private closed = false

  update<T>(fn: (tx: WriteTransaction) => T): T {
    this.assertOpen()
    if (this.depth > 0) throw StorageError.nestedUpdate()

    const lifetime = new Lifetime()
    const tx = new MemoryWriteTransaction(lifetime, this.committed)

    this.depth++
    try {
      const result = fn(tx)
      this.committed = tx.draft
      return result
    } finally {
      this.depth--
      lifetime.end()
    }
  }

  view<T>(fn: (tx: ReadTransaction) => T): T {
    this.assertOpen()

    const lifetime = new Lifetime()

    this.depth++
    try {
      return fn(new MemoryReadTransaction(lifetime, this.committed))
    } finally {
      this.depth--
      lifetime.end()
    }
  }

  close(): void {
    this.closed = true
    this.committed = new Map()
  }

  private assertOpen(): void {
    if (this.closed) throw StorageError.closed()
  }
}
