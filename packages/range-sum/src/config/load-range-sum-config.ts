import { type ConfigSource, DotenvSource, EnvSource, loadConfig, ObjectSource } from "@rangecache/config"
import { type EnvConfig, envSchema, type RangeSumConfig, type RangeSumEnvKey } from "./schema"

export type LoadRangeSumConfigOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>

  /**
   * Directory holding the optional `.env` file.
   *
   * @default process.cwd()
   */
  cwd?: string

  /**
   * Raw values applied after every other source, e.g. from CLI flags.
   */
  overrides?: Partial<Record<RangeSumEnvKey, string>>
}

export function mapEnvToConfig(env: EnvConfig): RangeSumConfig {
  return {
    cache: {
      capacity: env.RANGE_SUM_CACHE_CAPACITY,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

export async function loadRangeSumConfig(
  options: LoadRangeSumConfigOptions = {},
): Promise<RangeSumConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd: options.cwd ?? process.cwd() }),
    new EnvSource({ env: options.env ?? process.env }),
  ]

  if (options.overrides) sources.push(new ObjectSource(options.overrides))

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
