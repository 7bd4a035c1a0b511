import { defaultEquals } from './observable'

/**
 * Outcome of one asynchronous operation: not started, in flight, failed or
 * succeeded. Exactly one variant is active, and a transition always replaces
 * the whole value.
 *
 * ```ts
 * const label = AsyncState.match(state, {
 *   empty: () => 'Nothing yet',
 *   loading: () => 'Loading…',
 *   error: message => `Failed: ${message}`,
 *   data: user => `Hello, ${user.name}`,
 * })
 * ```
 */
export type AsyncState<T> =
  | AsyncState.Empty
  | AsyncState.Loading
  | AsyncState.Error
  | AsyncState.Data<T>

export namespace AsyncState {
  export interface Empty {
    readonly kind: 'empty'
  }

  export interface Loading {
    readonly kind: 'loading'
  }

  export interface Error {
    readonly kind: 'error'
    /** Human readable description of the failure. */
    readonly message: string
    /** The failure itself, when there is one. */
    readonly cause?: unknown
  }

  export interface Data<T> {
    readonly kind: 'data'
    readonly value: T
  }

  export type Kind = AsyncState<unknown>['kind']

  const EMPTY: Empty = Object.freeze({ kind: 'empty' })
  const LOADING: Loading = Object.freeze({ kind: 'loading' })

  export function empty(): Empty {
    return EMPTY
  }

  export function loading(): Loading {
    return LOADING
  }

  export function error(message: string, cause?: unknown): Error {
    return cause === undefined ? { kind: 'error', message } : { kind: 'error', message, cause }
  }

  export function data<T>(value: T): Data<T> {
    return { kind: 'data', value }
  }

  export function isEmpty<T>(state: AsyncState<T>): state is Empty {
    return state.kind === 'empty'
  }

  export function isLoading<T>(state: AsyncState<T>): state is Loading {
    return state.kind === 'loading'
  }

  export function hasError<T>(state: AsyncState<T>): state is Error {
    return state.kind === 'error'
  }

  export function hasData<T>(state: AsyncState<T>): state is Data<T> {
    return state.kind === 'data'
  }

  export function dataOrUndefined<T>(state: AsyncState<T>): T | undefined {
    return state.kind === 'data' ? state.value : undefined
  }

  export function errorMessageOrUndefined<T>(state: AsyncState<T>): string | undefined {
    return state.kind === 'error' ? state.message : undefined
  }

  /**
   * Transforms the value of a `data` state. Any other state is carried over as is.
   */
  export function map<T, R>(state: AsyncState<T>, transform: (value: T) => R): AsyncState<R> {
    switch (state.kind) {
      case 'data':
        return data(transform(state.value))
      case 'empty':
      case 'loading':
      case 'error':
        return state
    }
  }

  export interface Handlers<T, R> {
    empty(): R
    loading(): R
    error(message: string, cause: unknown): R
    data(value: T): R
  }

  /**
   * Handles every variant. Adding a variant is a compile error at each call site.
   */
  export function match<T, R>(state: AsyncState<T>, handlers: Handlers<T, R>): R {
    switch (state.kind) {
      case 'empty':
        return handlers.empty()
      case 'loading':
        return handlers.loading()
      case 'error':
        return handlers.error(state.message, state.cause)
      case 'data':
        return handlers.data(state.value)
    }
  }

  /**
   * Like {@link match}, with `orElse` standing in for every handler left out.
   */
  export function maybeMatch<T, R>(state: AsyncState<T>, handlers: Partial<Handlers<T, R>>, orElse: () => R): R {
    return match(state, {
      empty: () => handlers.empty ? handlers.empty() : orElse(),
      loading: () => handlers.loading ? handlers.loading() : orElse(),
      error: (message, cause) => handlers.error ? handlers.error(message, cause) : orElse(),
      data: value => handlers.data ? handlers.data(value) : orElse(),
    })
  }

  /**
   * Same variant with the same payload. Data values are compared with
   * {@link defaultEquals}, error causes with `Object.is`.
   */
  export function equals<T>(a: AsyncState<T>, b: AsyncState<T>): boolean {
    if (a === b) {
      return true
    }
    switch (a.kind) {
      case 'empty':
      case 'loading':
        return a.kind === b.kind
      case 'error':
        return b.kind === 'error' && a.message === b.message && Object.is(a.cause, b.cause)
      case 'data':
        return b.kind === 'data' && defaultEquals(a.value, b.value)
    }
  }
}
