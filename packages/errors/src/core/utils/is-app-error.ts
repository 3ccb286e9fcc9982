import type { AppError, ErrorCode } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural type guard for AppError, optionally narrowed to one code.
 *
 * @example
 * ```ts
 * try {
 *   store.rangeSum(4, 2)
 * } catch (err) {
 *   if (isAppError(err, "out_of_range")) logger.warn(err.message, { err })
 * }
 * ```
 */
export function isAppError(e: unknown, code?: ErrorCode): e is AppError {
  if (!isRecord(e)) return false

  const matches =
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"

  return matches && (code === undefined || e.code === code)
}
