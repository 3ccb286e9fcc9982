import {
  type EvictionCache,
  LruEvictionCache,
} from "@rangecache/cache"
import type { BaseError } from "@rangecache/errors"
import { createNullLogger, type Logger } from "@rangecache/logger"
import type { Interval, IntervalKey } from "../ports/interval"
import type {
  RangeSumQueries,
  RangeSumResult,
  RangeSumStats,
} from "../ports/range-sum-queries"
import { checkIndex, checkInterval, checkSum, checkValue, checkValues, ensureValid } from "./bounds"
import { intervalContains, parseIntervalKey, toIntervalKey } from "./interval-key"
import { sumRange } from "./sum"

export type RangeSumStoreOptions = {
  /**
   * Maximum number of cached intervals. Must be an integer >= 1.
   */
  capacity: number
}

export type RangeSumStoreDeps = {
  logger?: Logger
}

/**
 * Range sums served through an LRU cache of `(left, right) -> sum`.
 *
 * Every cached sum matches the current array: `update()` drops each cached
 * interval that contains the written index before returning. That scan is
 * linear in the number of cached intervals, which `capacity` bounds.
 *
 * Not safe for concurrent use; callers sharing a store across workers must
 * serialize whole `rangeSum` / `update` calls.
 */
export class RangeSumStore implements RangeSumQueries {
  private readonly values: number[]
  private readonly cache: EvictionCache<IntervalKey, number>
  private readonly logger: Logger

  private hits = 0
  private misses = 0
  private evictions = 0
  private invalidations = 0

  constructor(
    values: readonly number[],
    opts: RangeSumStoreOptions,
    deps: RangeSumStoreDeps = {},
  ) {
    const invalid = checkValues(values)
    if (invalid) throw invalid

    this.values = [...values]
    this.logger = deps.logger ?? createNullLogger()
    this.cache = new LruEvictionCache<IntervalKey, number>({
      capacity: opts.capacity,
      onEvict: (key) => this.recordEviction(key),
    })

    this.logger.debug("range-sum store created", {
      capacity: this.cache.capacity,
      length: this.values.length,
    })
  }

  get length(): number {
    return this.values.length
  }

  rangeSum(left: number, right: number): number {
    return this.query(left, right).value
  }

  /**
   * Like {@link rangeSum}, but also reports whether the cache answered.
   */
  query(left: number, right: number): RangeSumResult {
    this.ensure(checkInterval(left, right, this.values.length))

    const key = toIntervalKey(left, right)
    const cached = this.cache.get(key)

    if (cached !== undefined) {
      this.hits++

      return { kind: "hit", value: cached }
    }

    const sum = sumRange(this.values, left, right)
    this.ensure(checkSum(sum, left, right))

    const value = Number(sum)

    this.misses++
    this.cache.put(key, value)

    return { kind: "miss", value }
  }

  update(index: number, value: number): void {
    this.ensure(checkIndex(index, this.values.length) ?? checkValue(value, index))

    this.values[index] = value

    let invalidated = 0

    for (const key of this.cache.keys()) {
      if (intervalContains(parseIntervalKey(key), index)) {
        this.cache.delete(key)
        invalidated++
      }
    }

    if (invalidated === 0) return

    this.invalidations += invalidated
    this.logger.debug("invalidated cached intervals", {
      index,
      invalidated,
      size: this.cache.size(),
    })
  }

  valueAt(index: number): number {
    this.ensure(checkIndex(index, this.values.length))

    const value = this.values[index]

    if (value === undefined) {
      throw new Error(`Invariant violation: no value at checked index ${index}`)
    }

    return value
  }

  toArray(): number[] {
    return [...this.values]
  }

  /**
   * Intervals currently cached, most recently used first. Does not count as
   * a use of any of them.
   */
  cachedIntervals(): Interval[] {
    return this.cache.keys().map(parseIntervalKey)
  }

  isCached(left: number, right: number): boolean {
    return this.cache.has(toIntervalKey(left, right))
  }

  stats(): RangeSumStats {
    return {
      size: this.cache.size(),
      capacity: this.cache.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      invalidations: this.invalidations,
    }
  }

  private recordEviction(key: IntervalKey): void {
    this.evictions++
    this.logger.debug("evicted cached interval", { ...parseIntervalKey(key) })
  }

  private ensure(err: BaseError | undefined): void {
    ensureValid(err, (rejected) => this.logger.warn(rejected.message, { err: rejected }))
  }
}
