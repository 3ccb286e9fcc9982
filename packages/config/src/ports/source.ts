/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and defaults belong to the zod
 * schema handed to `loadConfig`. Sources are applied in order; later ones
 * override earlier ones, and a key mapped to `undefined` counts as absent.
 */
export interface ConfigSource {
  /**
   * Name reported by `IConfig.explain()`, e.g. "env" or "dotenv:.env".
   */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
