/**
 * Validated configuration with provenance.
 *
 * @typeParam T - Shape of the configuration object, inferred from a zod schema.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ RANGE_SUM_CACHE_CAPACITY: z.coerce.number().default(1000) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("RANGE_SUM_CACHE_CAPACITY")     // 1000
 * config.explain("RANGE_SUM_CACHE_CAPACITY") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that provided the final value for a key, or
   * `"default"` when the schema default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Names of all sources that contributed at least one value.
   */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   */
  unknownKeys(): string[]
}
