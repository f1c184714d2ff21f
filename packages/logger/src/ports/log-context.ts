export type LogContext = {
  service: string
  module: string
  env: string

  /** Bucket path of the store emitting the entry, joined with "/". */
  bucket: string
  /** Store operation (put, get, pull, delete, forEach, deleteAll). */
  op: string
  /** Codec fingerprint in use. */
  codec: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Partial overlay merged into a logger's context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
