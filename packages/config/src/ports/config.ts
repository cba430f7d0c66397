/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ LOCK_TTL_MS: z.coerce.number().default(3000) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("LOCK_TTL_MS")     // 3000
 * config.explain("LOCK_TTL_MS") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  keys(): string[]

  /**
   * Name of the source that provided the final value for `key`, or "default"
   * when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Source names that contributed at least one value, without duplicates. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   * Usually a typo or a stale setting.
   */
  unknownKeys(): string[]
}
