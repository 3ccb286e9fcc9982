import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("creates error with required fields", () => {
      const err = new BaseError("index 12 is outside [0, 10)", { code: "out_of_range" })

      expect(err.message).toBe("index 12 is outside [0, 10)")
      expect(err.code).toBe("out_of_range")
    })

    it("sets name to constructor name", () => {
      class OutOfBounds extends BaseError<"out_of_bounds"> {
        constructor() {
          super("out of bounds", { code: "out_of_bounds" })
        }
      }

      expect(new BaseError("test", { code: "test" }).name).toBe("BaseError")
      expect(new OutOfBounds().name).toBe("OutOfBounds")
    })

    it("defaults context to an empty frozen object", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults isRetryable to false and isOperational to true", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
    })

    it("sets timestamp to current time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("copies and freezes the provided context", () => {
      const context = { index: 3, length: 2 }
      const err = new BaseError("test", { code: "test", context })

      context.index = 99

      expect(err.context).toEqual({ index: 3, length: 2 })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("root cause")
      const err = new BaseError("wrapped", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })

    it("accepts isOperational=false for contract violations", () => {
      const err = new BaseError("bad call", { code: "test", isOperational: false })

      expect(err.isOperational).toBe(false)
    })

    it("is an Error with a stack trace", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err).toBeInstanceOf(Error)
      expect(err.stack).toContain("BaseError")
    })
  })

  describe("type safety", () => {
    it("preserves generic code type", () => {
      type StoreCode = "out_of_range" | "invalid_value"
      const err = new BaseError<StoreCode>("bad", { code: "invalid_value" })

      const code: StoreCode = err.code
      expect(code).toBe("invalid_value")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new BaseError("bad interval", {
        code: "out_of_range",
        context: { left: 4, right: 2 },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "out_of_range",
        message: "bad interval",
        context: { left: 4, right: 2 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("is what JSON.stringify emits", () => {
      const err = new BaseError("bad", { code: "test" })

      expect(JSON.parse(JSON.stringify(err))).toEqual(err.toJSON())
    })
  })
})
