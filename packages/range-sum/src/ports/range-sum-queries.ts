/**
 * Range-sum queries and point updates over a fixed-length integer array.
 *
 * Indices are zero-based. Invalid indices throw `OutOfRangeError` before any
 * state changes.
 */
export interface RangeSumQueries {
  readonly length: number

  /** Sum of the values at indices `left..=right`. */
  rangeSum(left: number, right: number): number

  /** Overwrite the value at `index`. */
  update(index: number, value: number): void

  valueAt(index: number): number

  /** Copy of the current values. */
  toArray(): number[]
}

export type RangeSumOutcome = "hit" | "miss"

export type RangeSumResult = {
  kind: RangeSumOutcome
  value: number
}

export type RangeSumStats = {
  /** Entries currently cached */
  size: number
  capacity: number
  hits: number
  misses: number
  /** Entries dropped to make room */
  evictions: number
  /** Entries dropped because a write touched their interval */
  invalidations: number
}
