import { DisposedResourceError } from './errors'
import { Emitter, type Event } from './event'
import { Disposable, type IDisposable } from './lifecycle'
import { defaultEquals, type EqualityComparer, type IObservable, type Observer } from './observable'

export interface ObservableValueOptions<T> {
  /**
   * Decides whether an assignment is a change. Defaults to {@link defaultEquals}.
   */
  readonly equals?: EqualityComparer<T>
  /**
   * Shows up in error messages.
   */
  readonly debugName?: string
}

/**
 * A mutable value cell that synchronously notifies its observers whenever the
 * value changes.
 *
 * ```ts
 * const count = new ObservableValue(0)
 * count.addObserver(() => console.log(count.value))
 * count.update(c => c + 1) // logs 1
 * ```
 */
export class ObservableValue<T> extends Disposable implements IObservable<T> {
  private _value: T
  private _isDisposed = false
  private readonly _equals: EqualityComparer<T>
  private readonly _observers = new Map<Observer, IDisposable[]>()
  private readonly _onDidChange = this._register(new Emitter<T>())

  readonly debugName: string

  readonly onDidChange: Event<T> = this._onDidChange.event

  constructor(initial: T, options?: ObservableValueOptions<T>) {
    super()
    this._value = initial
    this._equals = options?.equals ?? defaultEquals
    this.debugName = options?.debugName ?? 'ObservableValue'
  }

  get isDisposed(): boolean {
    return this._isDisposed
  }

  get value(): T {
    return this._value
  }

  set value(newValue: T) {
    this._throwIfDisposed()
    if (this._equals(this._value, newValue)) {
      return
    }
    this._value = newValue
    this._onDidChange.fire(newValue)
  }

  /**
   * Replaces the value with `updater(value)`.
   */
  update(updater: (current: T) => T): void {
    this._throwIfDisposed()
    this.value = updater(this._value)
  }

  addObserver(observer: Observer): void {
    this._throwIfDisposed()
    const subscription = this._onDidChange.event(() => observer())
    const registrations = this._observers.get(observer)
    if (registrations) {
      registrations.push(subscription)
    } else {
      this._observers.set(observer, [subscription])
    }
  }

  /**
   * Removes one registration of `observer`. Does nothing if it is not registered.
   */
  removeObserver(observer: Observer): void {
    const registrations = this._observers.get(observer)
    if (!registrations) {
      return
    }
    registrations.shift()?.dispose()
    if (registrations.length === 0) {
      this._observers.delete(observer)
    }
  }

  override dispose(): void {
    if (this._isDisposed) {
      return
    }
    this._isDisposed = true
    this._observers.clear()
    super.dispose()
  }

  private _throwIfDisposed(): void {
    if (this._isDisposed) {
      throw new DisposedResourceError(this.debugName)
    }
  }
}
