export {
  createLruEvictionCache,
  LruEvictionCache,
} from "./core/eviction/lru-eviction-cache"
export { assertValidCapacity, CapacityInvalidError } from "./core/errors"
export { type RecencyHandle, RecencyList } from "./core/recency/recency-list"
export type {
  EvictionCache,
  EvictionCacheOptions,
  EvictionListener,
} from "./ports/eviction-cache"
