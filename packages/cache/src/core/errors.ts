import { BaseError } from "@rangecache/errors"

export class CapacityInvalidError extends BaseError<"capacity_invalid"> {
  constructor(capacity: number) {
    super(`Cache capacity must be an integer >= 1, got: ${capacity}`, {
      code: "capacity_invalid",
      context: { capacity },
      isOperational: false,
    })
  }
}

export function assertValidCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new CapacityInvalidError(capacity)
  }
}
