/**
 * Exact sum of `values[left..=right]`. Bounds are the caller's job.
 */
export function sumRange(values: readonly number[], left: number, right: number): bigint {
  let total = 0n

  for (let i = left; i <= right; i++) {
    total += BigInt(values[i] ?? 0)
  }

  return total
}
