/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ LARDER_BUCKET: z.string().default("default") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.LARDER_BUCKET       // "people"
 * config.explain("LARDER_BUCKET")  // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that supplied the final value for `key`, or "default"
   * when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that contributed, in first-use order. */
  sourcesUsed(): string[]

  /** Keys provided by sources that the schema does not define. */
  unknownKeys(): string[]
}
