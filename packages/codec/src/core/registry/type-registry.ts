/**
 * Any class, including abstract ones.
 */
export type Constructor<T extends object = object> = abstract new (
  ...args: never[]
) => T

/**
 * Process-wide mapping between class names and prototypes, used by formats
 * that carry type metadata to rebuild class instances on decode.
 *
 * @remarks
 * Registration is by name: the same class may be registered repeatedly under
 * the same name, but one name can never point at two different classes.
 * Decoded instances are created from the prototype without running the
 * constructor, then the stored fields are assigned.
 */
export class TypeRegistry {
  private readonly byName = new Map<string, object>()
  private readonly byPrototype = new Map<object, string>()

  register<T extends object>(ctor: Constructor<T>, name: string = ctor.name): void {
    const proto: unknown = ctor.prototype

    if (typeof proto !== "object" || proto === null) {
      throw new TypeError(`cannot register ${name}: constructor has no prototype`)
    }

    if (!name) {
      throw new TypeError("cannot register an anonymous class without a name")
    }

    const existing = this.byName.get(name)
    if (existing !== undefined && existing !== proto) {
      throw new TypeError(`type name already registered for another class: ${name}`)
    }

    const previousName = this.byPrototype.get(proto)
    if (previousName !== undefined && previousName !== name) {
      throw new TypeError(`${name} is already registered as ${previousName}`)
    }

    this.byName.set(name, proto)
    this.byPrototype.set(proto, name)
  }

  /** Registered name for the class of `value`, if any. */
  nameOf(value: object): string | undefined {
    const proto: unknown = Object.getPrototypeOf(value)

    return typeof proto === "object" && proto !== null
      ? this.byPrototype.get(proto)
      : undefined
  }

  /**
   * Creates an instance of the class registered under `name` with `fields`
   * assigned, or returns undefined when the name is unknown.
   */
  instantiate(name: string, fields: Readonly<Record<string, unknown>>): object | undefined {
    const proto = this.byName.get(name)
    if (proto === undefined) return undefined

    const instance: object = Object.create(proto)
    return Object.assign(instance, fields)
  }

  has(name: string): boolean {
    return this.byName.has(name)
  }
}

export const defaultTypeRegistry = new TypeRegistry()

/**
 * Registers `ctor` with the process-wide registry so metadata-carrying
 * formats can encode and decode its instances.
 */
export function registerType<T extends object>(ctor: Constructor<T>, name?: string): void {
  defaultTypeRegistry.register(ctor, name)
}

