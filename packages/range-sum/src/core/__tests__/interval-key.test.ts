import { intervalContains, parseIntervalKey, toIntervalKey } from "../interval-key"

describe("interval keys", () => {
  it("encodes an interval as left:right", () => {
    expect(toIntervalKey(0, 5)).toBe("0:5")
    expect(toIntervalKey(12, 12)).toBe("12:12")
  })

  it("parses a key back into its bounds", () => {
    expect(parseIntervalKey("6:9")).toEqual({ left: 6, right: 9 })
    expect(parseIntervalKey(toIntervalKey(1234, 99999))).toEqual({ left: 1234, right: 99999 })
  })

  it("distinct intervals never share a key", () => {
    expect(toIntervalKey(1, 23)).not.toBe(toIntervalKey(12, 3))
  })
})

describe("intervalContains", () => {
  const interval = { left: 2, right: 4 }

  it.each([2, 3, 4])("contains %i", (index) => {
    expect(intervalContains(interval, index)).toBe(true)
  })

  it.each([0, 1, 5, 9])("does not contain %i", (index) => {
    expect(intervalContains(interval, index)).toBe(false)
  })
})
