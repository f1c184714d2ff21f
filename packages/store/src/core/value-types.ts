import { type Constructor } from "@larder/codec"
import { z } from "zod"
import type { ValueType } from "../ports/value-type"

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false

  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function hydrate(ctor: Constructor, input: unknown): unknown {
  if (input instanceof ctor || !isPlainRecord(input)) return input

  const proto: unknown = ctor.prototype
  if (typeof proto !== "object" || proto === null) return input

  const instance: object = Object.create(proto)
  return Object.assign(instance, input)
}

export const valueTypes = {
  /**
   * Accepts instances of `ctor`. Plain objects, as produced by formats that
   * carry no type information, are turned into instances by assigning their
   * fields to an object with `ctor`'s prototype; the constructor is not run.
   *
   * Without `fields` the record's values are assigned as decoded. With it,
   * plain records are first parsed through those field schemas, so formats
   * that decode every leaf as text can coerce them back:
   *
   * ```ts
   * valueTypes.instanceOf(Person, { age: z.coerce.number().optional() })
   * ```
   *
   * Fields missing from `fields` pass through unchanged.
   */
  instanceOf: <T extends object>(
    ctor: Constructor<T>,
    fields?: Record<string, z.ZodType>,
  ): ValueType<T> => {
    const instance = z.custom<T>((value) => value instanceof ctor, {
      message: `expected an instance of ${ctor.name}`,
    })
    const hydrated = z.preprocess((input) => hydrate(ctor, input), instance)

    if (fields === undefined) return hydrated

    const record = z.custom<Record<string, unknown>>(isPlainRecord).pipe(z.looseObject(fields))

    return z.union([instance, record.pipe(hydrated)])
  },

  /** Accepts any decoded value as-is. */
  unknown: z.unknown(),
}
