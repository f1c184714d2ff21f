import type { ZodType } from "zod"

/**
 * Shape a decoded value is validated into. Decoders produce untyped trees;
 * the store runs the value type over them before handing values out.
 */
export type ValueType<T> = ZodType<T>
