import { lcg, sequence } from "../range-sum-fixtures"

describe("sequence", () => {
  it("counts from one by default", () => {
    expect(sequence(4)).toEqual([1, 2, 3, 4])
  })

  it("builds any element type from its index", () => {
    const intervals = sequence(3, (i) => ({ left: i, right: i * 2 }))

    expect(intervals.map(({ left, right }) => right - left)).toEqual([0, 1, 2])
  })
})

describe("lcg", () => {
  it("repeats for the same seed and stays below the bound", () => {
    const a = lcg(11)
    const b = lcg(11)
    const draws = sequence(20, () => a(7))

    expect(draws).toEqual(sequence(20, () => b(7)))
    expect(draws.every((n) => n >= 0 && n < 7)).toBe(true)
  })
})
