import { createPinoLogger, type Logger } from "@rangecache/logger"
import {
  type LoadRangeSumConfigOptions,
  loadRangeSumConfig,
} from "./config/load-range-sum-config"
import type { RangeSumConfig } from "./config/schema"
import { RangeSumStore } from "./core/range-sum-store"

export type CreateRangeSumStoreDeps = {
  /**
   * Logger to scope the store under. A pino logger built from
   * `config.logging` is used when omitted.
   */
  logger?: Logger
}

export function createRangeSumLogger(logging: RangeSumConfig["logging"]): Logger {
  return createPinoLogger(
    {},
    { level: logging.level, prettify: logging.prettify },
    { service: logging.serviceName },
  )
}

export function createRangeSumStore(
  values: readonly number[],
  config: RangeSumConfig,
  deps: CreateRangeSumStoreDeps = {},
): RangeSumStore {
  const logger = deps.logger ?? createRangeSumLogger(config.logging)

  return new RangeSumStore(
    values,
    { capacity: config.cache.capacity },
    { logger: logger.child({ module: "range-sum" }) },
  )
}

export async function createRangeSumStoreFromEnv(
  values: readonly number[],
  options: LoadRangeSumConfigOptions = {},
  deps: CreateRangeSumStoreDeps = {},
): Promise<RangeSumStore> {
  const config = await loadRangeSumConfig(options)

  return createRangeSumStore(values, config, deps)
}
