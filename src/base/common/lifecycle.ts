import { once } from './functional'
import { Iterable } from './iterator'
import { getLogContext } from './log'


export interface IDisposableTracker {
  /** Is called on construction of a disposable. */
  trackDisposable(disposable: IDisposable): void

  /**
   * Is called when a disposable is registered as child of another disposable (e.g. {@link DisposableStore})
   * If parent is `null`, the disposable is removed from its former parent.
   */
  setParent(child: IDisposable, parent: IDisposable | null): void

  /** Is called when a disposable is disposed. */
  markAsDisposed(disposable: IDisposable): void

  /** Indicates that the given object is a singleton which does not need to be disposed. */
  markAsSingleton(disposable: IDisposable): void
}

let disposableTracker: IDisposableTracker | null = null

/**
 * An object that performs a cleanup operation when .dispose() is called.
 * Some examples of how disposables are used:
 * - A subscription to a stream that stops delivery when .dispose() is called.
 * - A container whose observers are dropped when .dispose() is called.
 * - A task whose result is ignored once .dispose() is called.
 */
export interface IDisposable {
  dispose(): void
}

export function setDisposableTracker(tracker: IDisposableTracker | null): void {
  disposableTracker = tracker
}

interface DisposableInfo {
  readonly value: IDisposable
  readonly source: string
  parent: IDisposable | null
  isSingleton: boolean
}

/**
 * Records every tracked disposable until it is disposed, to find the ones that
 * never will be.
 */
export class DisposableTracker implements IDisposableTracker {
  private readonly _livingDisposables = new Map<IDisposable, DisposableInfo>()

  private _getOrCreate(d: IDisposable): DisposableInfo {
    let info = this._livingDisposables.get(d)
    if (!info) {
      info = { value: d, source: new Error().stack ?? '', parent: null, isSingleton: false }
      this._livingDisposables.set(d, info)
    }
    return info
  }

  trackDisposable(d: IDisposable): void {
    this._getOrCreate(d)
  }

  setParent(child: IDisposable, parent: IDisposable | null): void {
    if (child === Disposable.None) {
      return
    }
    this._getOrCreate(child).parent = parent
  }

  markAsDisposed(d: IDisposable): void {
    this._livingDisposables.delete(d)
  }

  markAsSingleton(d: IDisposable): void {
    this._getOrCreate(d).isSingleton = true
  }

  /**
   * Living disposables that nothing living owns: neither disposed, nor a
   * singleton, nor registered with a parent that is itself still alive.
   */
  computeLeakingDisposables(): IDisposable[] {
    const leaking: IDisposable[] = []
    for (const info of this._livingDisposables.values()) {
      const isRoot = !info.parent || !this._livingDisposables.has(info.parent)
      if (isRoot && !info.isSingleton) {
        leaking.push(info.value)
      }
    }
    return leaking
  }

  /** Creation stack of a tracked disposable, for leak reports. */
  sourceOf(d: IDisposable): string | undefined {
    return this._livingDisposables.get(d)?.source
  }
}

export function trackDisposable<T extends IDisposable>(x: T): T {
  disposableTracker?.trackDisposable(x)
  return x
}

export function markAsDisposed(disposable: IDisposable): void {
  disposableTracker?.markAsDisposed(disposable)
}

function setParentOfDisposable(child: IDisposable, parent: IDisposable | null) {
  disposableTracker?.setParent(child, parent)
}

export function markAsSingleton<T extends IDisposable>(singleton: T): T {
  disposableTracker?.markAsSingleton(singleton)
  return singleton
}

export function isDisposable<E extends object>(thing: E): thing is E & IDisposable {
  return 'dispose' in thing && typeof thing.dispose === 'function' && thing.dispose.length === 0
}

/** Disposes of the value(s) passed in. */
export function dispose<T extends IDisposable>(disposable: T): T;
export function dispose<T extends IDisposable>(disposable: T | undefined): T | undefined;
export function dispose<T extends IDisposable, A extends Iterable<T> = Iterable<T>>(disposables: A): A;
export function dispose<T extends IDisposable>(arg: T | Iterable<T> | undefined): T | Iterable<T> | undefined {
  if (Iterable.is<T>(arg)) {
    const errors: unknown[] = []
    for (const d of arg) {
      if (d) {
        try {
          d.dispose()
        } catch (e) {
          errors.push(e)
        }
      }
    }

    if (errors.length === 1) {
      throw errors[0]
    } else if (errors.length > 1) {
      throw new AggregateError(errors, 'Encountered errors while disposing of store')
    }

    return arg
  } else if (arg) {
    arg.dispose()
    return arg
  }
  return undefined
}

export function toDisposable(fn: () => void): IDisposable {
  const self = trackDisposable({
    dispose: once(() => {
      markAsDisposed(self)
      fn()
    })
  })
  return self
}

/**
 * Manage a collection of disposable values.
 *
 * This is the preferred way to manage multiple disposables. A `DisposableStore` is safer to work with than an
 * `IDisposable[]` as it considers edge cases, such as registering the same value multiple times or adding an item to a
 * store that has already been disposed of.
 */
export class DisposableStore implements IDisposable {
  static DISABLE_DISPOSED_WARNING = false

  private readonly _toDispose = new Set<IDisposable>()
  private _isDisposed = false

  constructor() {
    trackDisposable(this)
  }

  get isDisposed(): boolean {
    return this._isDisposed
  }

  get size(): number {
    return this._toDispose.size
  }

  dispose(): void {
    if (this._isDisposed) {
      return
    }

    markAsDisposed(this)
    this._isDisposed = true
    this.clear()
  }

  /**
   * Disposes of every registered value without marking the store as disposed.
   */
  clear(): void {
    if (this._toDispose.size === 0) {
      return
    }
    const toDispose = Array.from(this._toDispose)
    this._toDispose.clear()
    dispose(toDispose)
  }

  add<T extends IDisposable>(o: T): T {
    if (o === this) {
      throw new Error('Cannot register a disposable on itself!')
    }
    setParentOfDisposable(o, this)
    if (this._isDisposed) {
      if (!DisposableStore.DISABLE_DISPOSED_WARNING) {
        getLogContext().warn?.(new Error('Trying to add a disposable to a DisposableStore that has already been disposed of. The added object will be leaked!').stack)
      }
    } else {
      this._toDispose.add(o)
    }
    return o
  }

  /**
   * Forgets `o` without disposing of it.
   */
  delete<T extends IDisposable>(o: T): void {
    if (this._toDispose.delete(o)) {
      setParentOfDisposable(o, null)
    }
  }
}

/**
 * Abstract base class for a {@link IDisposable disposable} object.
 *
 * Subclasses can {@linkcode _register} disposables that will be automatically cleaned up when the object is disposed.
 */
export abstract class Disposable implements IDisposable {
  static readonly None = Object.freeze<IDisposable>({ dispose() { } })

  protected readonly _store = new DisposableStore()

  protected constructor() {
    trackDisposable(this)
    setParentOfDisposable(this._store, this)
  }

  public dispose(): void {
    markAsDisposed(this)
    this._store.dispose()
  }

  /**
   * Adds o to the collection of disposables managed by this object.
   */
  protected _register<T extends IDisposable>(o: T): T {
    if (o === this) {
      throw new Error('Cannot register a disposable on itself!')
    }
    return this._store.add(o)
  }
}

/**
 * Manages the lifecycle of a disposable value that may be changed.
 *
 * This ensures that when the disposable value is changed, the previously held disposable is disposed of. Holding the
 * latest {@link CancellableTask} here cancels the superseded one whenever a new task replaces it.
 */
export class MutableDisposable<T extends IDisposable> implements IDisposable {
  private _value?: T
  private _isDisposed = false

  constructor() {
    trackDisposable(this)
  }

  get value(): T | undefined {
    return this._isDisposed ? undefined : this._value
  }

  set value(value: T | undefined) {
    if (this._isDisposed || value === this._value) {
      return
    }
    this._value?.dispose()
    if (value) {
      setParentOfDisposable(value, this)
    }
    this._value = value
  }

  clear(): void {
    this.value = undefined
  }

  dispose(): void {
    this._isDisposed = true
    markAsDisposed(this)
    this._value?.dispose()
    this._value = undefined
  }

  clearAndLeak(): T | undefined {
    const oldValue = this._value
    this._value = undefined
    if (oldValue) {
      setParentOfDisposable(oldValue, null)
    }
    return oldValue
  }
}

/**
 * A disposable whose cleanup is attached after construction and runs at most once.
 */
export class SafeDisposable implements IDisposable {
  dispose: () => void = () => { }

  constructor() {
    trackDisposable(this)
  }

  set(fn: () => void): this {
    let callback: (() => void) | undefined = fn
    this.dispose = () => {
      if (callback) {
        callback()
        callback = undefined
        markAsDisposed(this)
      }
    }
    return this
  }
}
