/**
 * `catch` 块中捕获值的类型守卫
 */

export function isError(value: unknown): value is Error {
  return value instanceof Error
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}

/** 包装非 Error 的抛出值 */
export function ensureError(value: unknown): Error {
  if (isError(value)) return value
  return new Error(String(value))
}
