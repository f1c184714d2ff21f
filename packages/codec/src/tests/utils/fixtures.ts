import { registerType } from "../../core/registry/type-registry"

export class Person {
  constructor(
    public name: string,
    public age?: number,
  ) {}

  greet(): string {
    return `hi ${this.name}`
  }
}

export class Address {
  constructor(
    public city: string,
    public owner?: Person,
  ) {}
}

/** Never registered. */
export class Stranger {
  constructor(public name: string) {}
}

registerType(Person)
registerType(Address)
