export namespace Iterable {
  export function is<T = unknown>(arg: unknown): arg is Iterable<T> {
    return typeof arg === 'object' && arg !== null && Symbol.iterator in arg && typeof arg[Symbol.iterator] === 'function'
  }
}
