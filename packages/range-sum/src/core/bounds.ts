import type { BaseError } from "@rangecache/errors"
import { InvalidValueError, OutOfRangeError, UnsafeSumError } from "./errors"

function isIndexWithin(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length
}

export function checkInterval(
  left: number,
  right: number,
  length: number,
): OutOfRangeError | undefined {
  if (isIndexWithin(left, length) && isIndexWithin(right, length) && left <= right) {
    return undefined
  }

  return new OutOfRangeError(
    `Interval [${left}, ${right}] must satisfy 0 <= left <= right < ${length}`,
    { left, right, length },
  )
}

export function checkIndex(index: number, length: number): OutOfRangeError | undefined {
  if (isIndexWithin(index, length)) return undefined

  return new OutOfRangeError(`Index ${index} must satisfy 0 <= index < ${length}`, {
    index,
    length,
  })
}

export function checkValue(value: number, index: number): InvalidValueError | undefined {
  return Number.isSafeInteger(value) ? undefined : new InvalidValueError(value, index)
}

export function checkValues(values: readonly number[]): InvalidValueError | undefined {
  for (const [index, value] of values.entries()) {
    const err = checkValue(value, index)

    if (err) return err
  }

  return undefined
}

export function checkSum(sum: bigint, left: number, right: number): UnsafeSumError | undefined {
  const safe = sum >= BigInt(Number.MIN_SAFE_INTEGER) && sum <= BigInt(Number.MAX_SAFE_INTEGER)

  return safe ? undefined : new UnsafeSumError(left, right, sum)
}

/**
 * Throws `err` when a check failed, after handing it to `onReject`.
 */
export function ensureValid(
  err: BaseError | undefined,
  onReject?: (err: BaseError) => void,
): void {
  if (!err) return

  onReject?.(err)

  throw err
}
