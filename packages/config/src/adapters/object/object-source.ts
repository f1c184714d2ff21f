import type { ConfigSource } from "../../ports/source"

/**
 * Fixed values, usually programmatic overrides applied after the environment.
 * The object is copied when the source is built.
 */
export class ObjectSource implements ConfigSource {
  private readonly values: Readonly<Record<string, unknown>>

  constructor(
    values: Readonly<Record<string, unknown>>,
    readonly name: string = "overrides",
  ) {
    this.values = { ...values }
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
