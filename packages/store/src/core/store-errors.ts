import { UnmarshalError } from "@larder/codec"
import { BaseError } from "@larder/errors"
import type { BucketPath } from "../ports/engine"

const showPath = (path: BucketPath): string => path.join("/")

export class NotFoundError extends BaseError<"not_found"> {
  static bucket(path: BucketPath): NotFoundError {
    return new NotFoundError(`bucket not found: ${showPath(path)}`, {
      code: "not_found",
      context: { bucket: showPath(path) },
    })
  }

  static key(path: BucketPath): NotFoundError {
    return new NotFoundError(`key not found in bucket ${showPath(path)}`, {
      code: "not_found",
      context: { bucket: showPath(path) },
    })
  }
}

export class InvalidCallbackError extends BaseError<"invalid_callback"> {
  static unknownKind(): InvalidCallbackError {
    return new InvalidCallbackError("callback must be created with onValue or onEntry", {
      code: "invalid_callback",
      isOperational: false,
    })
  }

  static notAFunction(kind: string): InvalidCallbackError {
    return new InvalidCallbackError(`${kind} callback is not a function`, {
      code: "invalid_callback",
      context: { kind },
      isOperational: false,
    })
  }

  static arity(kind: string, expected: number, actual: number): InvalidCallbackError {
    const parameters = expected === 1 ? "parameter" : "parameters"

    return new InvalidCallbackError(
      `${kind} callback must declare exactly ${expected} ${parameters}, got ${actual}`,
      {
        code: "invalid_callback",
        context: { kind, expected, actual },
        isOperational: false,
      },
    )
  }
}

const RETRYABLE_SQLITE_CODES = new Set(["SQLITE_BUSY", "SQLITE_LOCKED"])

function engineCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined
  return typeof err.code === "string" ? err.code : undefined
}

export class StorageError extends BaseError<"storage_failed"> {
  static from(op: string, err: unknown): StorageError {
    if (err instanceof StorageError) return err

    const engine = engineCode(err)

    return new StorageError(`${op}: storage engine failed`, {
      code: "storage_failed",
      context: { op, ...(engine !== undefined && { engineCode: engine }) },
      cause: err,
      isRetryable: engine !== undefined && RETRYABLE_SQLITE_CODES.has(engine),
    })
  }

  static nestedUpdate(): StorageError {
    return new StorageError("cannot start a write transaction inside another transaction", {
      code: "storage_failed",
      isOperational: false,
    })
  }

  static closed(): StorageError {
    return new StorageError("engine is closed", { code: "storage_failed" })
  }

  static transactionClosed(): StorageError {
    return new StorageError("transaction handle used after the transaction ended", {
      code: "storage_failed",
      isOperational: false,
    })
  }

  static bucketMissing(path: BucketPath): StorageError {
    return new StorageError(`bucket no longer exists: ${showPath(path)}`, {
      code: "storage_failed",
      context: { bucket: showPath(path) },
    })
  }

  static keyRequired(): StorageError {
    return new StorageError("key required", { code: "storage_failed" })
  }

  static notABlob(column: string): StorageError {
    return new StorageError(`expected a blob in column ${column}`, {
      code: "storage_failed",
      context: { column },
    })
  }

  static invalidBucketPath(reason: string): StorageError {
    return new StorageError(`invalid bucket path: ${reason}`, {
      code: "storage_failed",
      context: { reason },
      isOperational: false,
    })
  }
}

/**
 * Records in a bucket were written with a codec whose fingerprint differs from
 * the one reading or writing now.
 */
export class CodecMismatchError extends UnmarshalError {
  static detected(path: BucketPath, stored: string, current: string): CodecMismatchError {
    return new CodecMismatchError(
      `bucket ${showPath(path)} was written with codec ${stored}, not ${current}`,
      {
        code: "codec_mismatch",
        context: { bucket: showPath(path), stored, current },
      },
    )
  }
}
