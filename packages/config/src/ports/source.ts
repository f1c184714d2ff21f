/**
 * Loads raw configuration values. Validation and coercion happen downstream;
 * later sources override earlier ones.
 */
export interface ConfigSource {
  /** e.g. "env", "dotenv:.env" */
  readonly name: string

  /**
   * Returning `undefined` for a key means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
