import { existsSync, readFileSync, renameSync, writeFileSync } from "node:fs"
import type { Database, SqlJsStatic, SqlValue } from "sql.js"
import { bucketId, descendantPrefix, lineage } from "../../core/bucket-path"
import { StorageError } from "../../core/store-errors"
import type {
  Bucket,
  BucketPath,
  ReadBucket,
  ReadTransaction,
  TransactionalEngine,
  WriteTransaction,
} from "../../ports/engine"
import { Lifetime } from "../lifetime"

const MEMORY = ":memory:"

const SCHEMA = `
  create table if not exists larder_buckets (
    id text primary key
  ) without rowid;

  create table if not exists larder_records (
    bucket text not null,
    key blob not null,
    value blob not null,
    primary key (bucket, key)
  ) without rowid;
`

const SQL = {
  hasBucket: "select 1 from larder_buckets where id = ?",
  insertBucket: "insert or ignore into larder_buckets (id) values (?)",
  deleteBuckets: "delete from larder_buckets where id = ? or instr(id, ?) = 1",
  deleteBucketRecords: "delete from larder_records where bucket = ? or instr(bucket, ?) = 1",
  getRecord: "select value from larder_records where bucket = ? and key = ?",
  putRecord: "insert or replace into larder_records (bucket, key, value) values (?, ?, ?)",
  deleteRecord: "delete from larder_records where bucket = ? and key = ?",
  scanRecords: "select key, value from larder_records where bucket = ? order by key",
} as const

let sqlJs: Promise<SqlJsStatic> | undefined

async function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= import("sql.js").then(({ default: initSqlJs }) => initSqlJs())
  return sqlJs
}

/**
 * Runs `sql` and returns every row. Statements are prepared per call:
 * `Database.export` frees all prepared statements.
 */
function rows(db: Database, sql: string, params: SqlValue[]): SqlValue[][] {
  const stmt = db.prepare(sql)
  try {
    stmt.bind(params)
    const out: SqlValue[][] = []
    while (stmt.step()) out.push(stmt.get())
    return out
  } finally {
    stmt.free()
  }
}

function blob(value: SqlValue | undefined, column: string): Uint8Array {
  if (value instanceof Uint8Array) return value
  throw StorageError.notABlob(column)
}

const bucketExists = (db: Database, id: string): boolean =>
  rows(db, SQL.hasBucket, [id]).length > 0

class SqliteReadBucket implements ReadBucket {
  constructor(
    protected readonly db: Database,
    protected readonly lifetime: Lifetime,
    protected readonly path: BucketPath,
    protected readonly id: string,
  ) {}

  get(key: Uint8Array): Uint8Array | undefined {
    this.assertUsable()

    const [row] = rows(this.db, SQL.getRecord, [this.id, key])
    return row && blob(row[0], "value")
  }

  forEach(visit: (key: Uint8Array, value: Uint8Array) => void): void {
    this.assertUsable()

    // Rows are read up front so callbacks may run other statements.
    for (const [key, value] of rows(this.db, SQL.scanRecords, [this.id])) {
      visit(blob(key, "key"), blob(value, "value"))
    }
  }

  protected assertUsable(): void {
    this.lifetime.assertOpen()
    if (!bucketExists(this.db, this.id)) throw StorageError.bucketMissing(this.path)
  }
}

class SqliteBucket extends SqliteReadBucket implements Bucket {
  put(key: Uint8Array, value: Uint8Array): void {
    if (key.length === 0) throw StorageError.keyRequired()
    this.assertUsable()

    this.db.run(SQL.putRecord, [this.id, key, value])
  }

  delete(key: Uint8Array): void {
    this.assertUsable()

    this.db.run(SQL.deleteRecord, [this.id, key])
  }
}

class SqliteReadTransaction implements ReadTransaction {
  constructor(
    protected readonly db: Database,
    protected readonly lifetime: Lifetime,
  ) {}

  bucket(path: BucketPath): ReadBucket | undefined {
    return this.find(path, SqliteReadBucket)
  }

  protected find<B extends SqliteReadBucket>(
    path: BucketPath,
    Kind: new (db: Database, lifetime: Lifetime, path: BucketPath, id: string) => B,
  ): B | undefined {
    this.lifetime.assertOpen()

    const id = bucketId(path)
    return bucketExists(this.db, id) ? new Kind(this.db, this.lifetime, path, id) : undefined
  }
}

class SqliteWriteTransaction extends SqliteReadTransaction implements WriteTransaction {
  override bucket(path: BucketPath): Bucket | undefined {
    return this.find(path, SqliteBucket)
  }

  createBucketIfNotExists(path: BucketPath): Bucket {
    this.lifetime.assertOpen()

    for (const ancestor of lineage(path)) {
      this.db.run(SQL.insertBucket, [bucketId(ancestor)])
    }

    return new SqliteBucket(this.db, this.lifetime, path, bucketId(path))
  }

  deleteBucket(path: BucketPath): boolean {
    this.lifetime.assertOpen()

    const id = bucketId(path)
    if (!bucketExists(this.db, id)) return false

    const prefix = descendantPrefix(path)
    this.db.run(SQL.deleteBucketRecords, [id, prefix])
    this.db.run(SQL.deleteBuckets, [id, prefix])

    return true
  }
}

export type SqliteEngineOptions = {
  /** Database file, or ":memory:". */
  path: string
}

/**
 * Durable engine on SQLite, compiled to WebAssembly by sql.js. Buckets are
 * rows of `larder_buckets`; records live in `larder_records` keyed by
 * `(bucket, key)`, and BLOB keys compare with memcmp, so scans come back in
 * byte order.
 *
 * @remarks
 * The database lives in memory. When opened on a file, the whole database is
 * written back to it after every committed update, through a temporary file
 * and a rename. One process owns the file at a time.
 */
export class SqliteEngine implements TransactionalEngine {
  private depth = 0
  private closed = false

  constructor(
    private readonly db: Database,
    private readonly file?: string,
  ) {
    db.exec(SCHEMA)
  }

  static async open(opts: SqliteEngineOptions): Promise<SqliteEngine> {
    const sql = await loadSqlJs()

    if (opts.path === MEMORY) return new SqliteEngine(new sql.Database())

    const data = existsSync(opts.path) ? readFileSync(opts.path) : undefined
    return new SqliteEngine(new sql.Database(data), opts.path)
  }

  update<T>(fn: (tx: WriteTransaction) => T): T {
    this.assertOpen()
    if (this.depth > 0) throw StorageError.nestedUpdate()

    const result = this.transaction((lifetime) => fn(new SqliteWriteTransaction(this.db, lifetime)))
    this.persist()

    return result
  }

  view<T>(fn: (tx: ReadTransaction) => T): T {
    this.assertOpen()

    return this.transaction((lifetime) => fn(new SqliteReadTransaction(this.db, lifetime)))
  }

  close(): void {
    if (this.closed) return

    this.closed = true
    this.db.close()
  }

  /** Inner views join the transaction already open on the connection. */
  private transaction<T>(body: (lifetime: Lifetime) => T): T {
    const outermost = this.depth === 0

    return this.run((lifetime) => {
      if (!outermost) return body(lifetime)

      this.db.run("begin")
      try {
        const result = body(lifetime)
        this.db.run("commit")
        return result
      } catch (err) {
        this.db.run("rollback")
        throw err
      }
    })
  }

  private persist(): void {
    if (this.file === undefined) return

    const staging = `${this.file}.tmp`
    writeFileSync(staging, this.db.export())
    renameSync(staging, this.file)
  }

  private run<T>(body: (lifetime: Lifetime) => T): T {
    const lifetime = new Lifetime()

    this.depth++
    try {
      return body(lifetime)
    } finally {
      this.depth--
      lifetime.end()
    }
  }

  private assertOpen(): void {
    if (this.closed) throw StorageError.closed()
  }
}
