import type { RangeSumQueries } from "../ports/range-sum-queries"
import {
  checkIndex,
  checkInterval,
  checkSum,
  checkValue,
  checkValues,
  ensureValid,
} from "./bounds"
import { sumRange } from "./sum"

/**
 * Baseline without a cache: every query sums directly, every update is a
 * plain write. Same validation and errors as {@link RangeSumStore}.
 */
export class UncachedRangeSumStore implements RangeSumQueries {
  private readonly values: number[]

  constructor(values: readonly number[]) {
    ensureValid(checkValues(values))

    this.values = [...values]
  }

  get length(): number {
    return this.values.length
  }

  rangeSum(left: number, right: number): number {
    ensureValid(checkInterval(left, right, this.values.length))

    const sum = sumRange(this.values, left, right)
    ensureValid(checkSum(sum, left, right))

    return Number(sum)
  }

  update(index: number, value: number): void {
    ensureValid(checkIndex(index, this.values.length) ?? checkValue(value, index))

    this.values[index] = value
  }

  valueAt(index: number): number {
    ensureValid(checkIndex(index, this.values.length))

    const value = this.values[index]

    if (value === undefined) {
      throw new Error(`Invariant violation: no value at checked index ${index}`)
    }

    return value
  }

  toArray(): number[] {
    return [...this.values]
  }
}
