import type { Interval, IntervalKey } from "../ports/interval"

export function toIntervalKey(left: number, right: number): IntervalKey {
  return `${left}:${right}`
}

export function parseIntervalKey(key: IntervalKey): Interval {
  const separator = key.indexOf(":")

  return {
    left: Number(key.slice(0, separator)),
    right: Number(key.slice(separator + 1)),
  }
}

export function intervalContains({ left, right }: Interval, index: number): boolean {
  return left <= index && index <= right
}
