/**
 * Wraps `fn` so that it runs at most once. Later calls return the first result.
 */
export function once<TArgs extends unknown[], TResult>(fn: (...args: TArgs) => TResult): (...args: TArgs) => TResult {
  let result: { readonly value: TResult } | undefined
  return (...args: TArgs) => {
    if (!result) {
      result = { value: fn(...args) }
    }
    return result.value
  }
}
