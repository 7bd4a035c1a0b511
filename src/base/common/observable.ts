import type { Event } from './event'
import type { IDisposable } from './lifecycle'

/**
 * Called synchronously after an observable changed. Observers take no
 * arguments; they read the new value through {@link IObservable.value}.
 */
export type Observer = () => void

/**
 * Read side of an observable value, as seen by UI adapters.
 */
export interface IObservable<T> extends IDisposable {
  /**
   * Reads the current value.
   */
  readonly value: T

  /**
   * Fires with the new value after every change, right after the observers ran.
   */
  readonly onDidChange: Event<T>

  readonly isDisposed: boolean

  addObserver(observer: Observer): void
  removeObserver(observer: Observer): void
}

export interface IEquatable<T> {
  equals(other: T): boolean
}

export type EqualityComparer<T> = (a: T, b: T) => boolean

function isEquatable(value: unknown): value is IEquatable<unknown> {
  return typeof value === 'object' && value !== null && 'equals' in value && typeof value.equals === 'function'
}

/**
 * `Object.is`, except that objects implementing {@link IEquatable} are compared
 * by their own `equals`.
 */
export function defaultEquals<T>(a: T, b: T): boolean {
  if (Object.is(a, b)) {
    return true
  }
  return isEquatable(a) && isEquatable(b) && a.equals(b)
}
