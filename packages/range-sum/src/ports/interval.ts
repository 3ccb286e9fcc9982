/**
 * Closed interval `[left, right]` over the backing array.
 */
export type Interval = {
  readonly left: number
  readonly right: number
}

/**
 * Cache key form of an {@link Interval}: `"left:right"`.
 *
 * @example
 * ```ts
 * const key: IntervalKey = "0:5"
 * ```
 */
export type IntervalKey = `${number}:${number}`
