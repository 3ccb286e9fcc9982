import { BaseError, type ErrorContext } from "@rangecache/errors"

export class OutOfRangeError extends BaseError<"out_of_range"> {
  constructor(message: string, context: ErrorContext) {
    super(message, { code: "out_of_range", context, isOperational: false })
  }
}

export class InvalidValueError extends BaseError<"invalid_value"> {
  constructor(value: number, index: number) {
    super(`Value ${value} at index ${index} is not a safe integer`, {
      code: "invalid_value",
      context: { value, index },
      isOperational: false,
    })
  }
}

export class UnsafeSumError extends BaseError<"unsafe_sum"> {
  constructor(left: number, right: number, sum: bigint) {
    super(`Sum over [${left}, ${right}] is ${sum}, outside the safe integer range`, {
      code: "unsafe_sum",
      context: { left, right, sum: sum.toString() },
      isOperational: false,
    })
  }
}
