/**
 * Error type guards and message extraction utilities.
 */

/** Type guard for Error instances */
export function isError(value: unknown): value is Error {
  return value instanceof Error
}

/** Safely extract error message from unknown thrown value */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}

/** Ensure unknown thrown value is an Error instance */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) return value
  return new Error(String(value))
}

/** Node errno code (ENOENT, ESRCH, ...) when present */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}
