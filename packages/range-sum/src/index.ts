export { CapacityInvalidError } from "@rangecache/cache"
export {
  type LoadRangeSumConfigOptions,
  loadRangeSumConfig,
  mapEnvToConfig,
} from "./config/load-range-sum-config"
export {
  type EnvConfig,
  envSchema,
  type RangeSumConfig,
  type RangeSumEnvKey,
} from "./config/schema"
export { InvalidValueError, OutOfRangeError, UnsafeSumError } from "./core/errors"
export { parseIntervalKey, toIntervalKey } from "./core/interval-key"
export {
  RangeSumStore,
  type RangeSumStoreDeps,
  type RangeSumStoreOptions,
} from "./core/range-sum-store"
export { UncachedRangeSumStore } from "./core/uncached-range-sum-store"
export {
  type CreateRangeSumStoreDeps,
  createRangeSumLogger,
  createRangeSumStore,
  createRangeSumStoreFromEnv,
} from "./create-range-sum-store"
export type { Interval, IntervalKey } from "./ports/interval"
export type {
  RangeSumOutcome,
  RangeSumQueries,
  RangeSumResult,
  RangeSumStats,
} from "./ports/range-sum-queries"
