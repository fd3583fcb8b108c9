/**
 * Result 类型 - 统一处理成功/失败结果
 * 采集结果用它表达 "读不到" 而不是用哨兵值
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok
}

// 解包 - 失败时返回默认值
export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.ok ? result.value : defaultValue
}

// 映射成功值
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result
}

// 将 Promise 包装为 Result，错误经 toError 归一化
export async function fromPromise<T, E>(
  promise: Promise<T>,
  toError: (e: unknown) => E
): Promise<Result<T, E>> {
  try {
    return ok(await promise)
  } catch (e) {
    return err(toError(e))
  }
}
