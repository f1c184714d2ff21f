import { registerType } from "@larder/codec"
import { z } from "zod"
import { valueTypes } from "../../core/value-types"

export class Person {
  constructor(
    public name: string,
    public age?: number,
  ) {}
}

/** Never registered. */
export class Stranger {
  constructor(public name: string) {}
}

registerType(Person)

export const person = valueTypes.instanceOf(Person)

/** Coerces `age` back to a number for formats that decode leaves as text. */
export const typedPerson = valueTypes.instanceOf(Person, {
  age: z.coerce.number().optional(),
})

export const utf8 = (text: string): Uint8Array => new TextEncoder().encode(text)
export const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes)
