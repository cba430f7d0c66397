/**
 * A source of raw configuration values.
 *
 * Sources only load; validation, coercion and merging happen in `loadConfig`.
 * Later sources override earlier ones, and an `undefined` value means "not provided".
 */
export interface ConfigSource {
  /** Used for provenance, e.g. "env", "dotenv:.env". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
