import { BaseError } from "@larder/errors"

export class MarshalError extends BaseError<"marshal_failed"> {
  static unregisteredType(format: string, typeName: string): MarshalError {
    return new MarshalError(`type not registered: ${typeName}`, {
      code: "marshal_failed",
      context: { format, typeName },
    })
  }

  static from(format: string, err: unknown): MarshalError {
    if (err instanceof MarshalError) return err

    return new MarshalError(`${format}: cannot encode value`, {
      code: "marshal_failed",
      context: { format },
      cause: err,
    })
  }
}

export type UnmarshalErrorCode = "unmarshal_failed" | "codec_mismatch"

export class UnmarshalError extends BaseError<UnmarshalErrorCode> {
  static malformed(format: string, reason: string, cause?: unknown): UnmarshalError {
    return new UnmarshalError(`${format}: malformed input: ${reason}`, {
      code: "unmarshal_failed",
      context: { format, reason },
      ...(cause !== undefined && { cause }),
    })
  }

  static endOfInput(format: string): UnmarshalError {
    return UnmarshalError.malformed(format, "unexpected end of input")
  }

  static unknownTypeId(format: string, typeId: number): UnmarshalError {
    return new UnmarshalError(`${format}: unknown type id ${typeId}`, {
      code: "unmarshal_failed",
      context: { format, typeId },
    })
  }

  static duplicateType(format: string, typeId: number): UnmarshalError {
    return new UnmarshalError(`${format}: duplicate definition for type id ${typeId}`, {
      code: "unmarshal_failed",
      context: { format, typeId },
    })
  }

  static unregisteredType(format: string, typeName: string): UnmarshalError {
    return new UnmarshalError(`type not registered: ${typeName}`, {
      code: "unmarshal_failed",
      context: { format, typeName },
    })
  }

  static invalidValue(format: string, issues: string, cause: unknown): UnmarshalError {
    return new UnmarshalError(`${format}: decoded value does not match its type\n${issues}`, {
      code: "unmarshal_failed",
      context: { format, issues },
      cause,
    })
  }

  static from(format: string, err: unknown): UnmarshalError {
    if (err instanceof UnmarshalError) return err

    return UnmarshalError.malformed(
      format,
      err instanceof Error ? err.message : String(err),
      err,
    )
  }
}

export class PrimeError extends BaseError<"prime_failed"> {
  static roundTripFailed(format: string, cause: unknown): PrimeError {
    return new PrimeError(`${format}: sample values do not round-trip`, {
      code: "prime_failed",
      context: { format },
      cause,
      isOperational: false,
    })
  }
}

export type PoolErrorCode = "foreign_coder" | "double_release"

export class PoolError extends BaseError<PoolErrorCode> {
  static foreign(pool: string): PoolError {
    return new PoolError(`${pool}: instance was not handed out by this pool`, {
      code: "foreign_coder",
      context: { pool },
      isOperational: false,
    })
  }

  static doubleRelease(pool: string): PoolError {
    return new PoolError(`${pool}: instance released twice`, {
      code: "double_release",
      context: { pool },
      isOperational: false,
    })
  }
}
