import { onUnexpectedError } from './errors'
import {
  Disposable,
  DisposableStore,
  type IDisposable,
  markAsDisposed,
  SafeDisposable,
  trackDisposable,
} from './lifecycle'
import { LinkedList } from './linkedList'
import { getLogContext } from './log'


/**
 * To an event a function with one or zero parameters
 * can be subscribed. The event is the subscriber function itself.
 */
export interface Event<T> {
  (listener: (e: T) => unknown, thisArgs?: unknown, disposables?: IDisposable[] | DisposableStore): IDisposable
}

let _globalLeakWarningThreshold = -1
export function setGlobalLeakWarningThreshold(n: number): IDisposable {
  const oldValue = _globalLeakWarningThreshold
  _globalLeakWarningThreshold = n
  return {
    dispose() {
      _globalLeakWarningThreshold = oldValue
    }
  }
}

export namespace Event {
  export const None: Event<never> = () => Disposable.None

  /**
   * Given an event, returns another event which is only fired once.
   * @param event The event source for the new event.
   */
  export function once<T>(event: Event<T>): Event<T> {
    return (listener, thisArgs = null, disposables?) => {
      // we need this, in case the event fires during the listener call
      let didFire = false
      let result: IDisposable | undefined = undefined
      result = event(e => {
        if (didFire) {
          return
        } else if (result) {
          result.dispose()
        } else {
          didFire = true
        }
        return listener.call(thisArgs, e)
      }, null, disposables)

      if (didFire) {
        result.dispose()
      }
      return result
    }
  }

  /**
   * Maps an event of one type into an event of another type using a mapping function, similar to how
   * `Array.prototype.map` works.
   *
   * *NOTE* that this function returns an `Event` and it MUST be called with a `DisposableStore` whenever the returned
   * event is accessible to "third parties", e.g the event is a public property. Otherwise a leaked listener on the
   * returned event causes this utility to leak a listener on the original event.
   *
   * @param event The event source for the new event.
   * @param map The mapping function.
   * @param disposable A disposable store to add the new EventEmitter to.
   */
  export function map<I, O>(event: Event<I>, map: (i: I) => O, disposable?: DisposableStore): Event<O> {
    return snapshot(
      (listener, thisArgs = null, disposables) =>
        event(i => listener.call(thisArgs, map(i)), null, disposables),
      disposable
    )
  }

  export function filter<T, U>(event: Event<T | U>, filter: (e: T | U) => e is T, disposable?: DisposableStore): Event<T>;
  export function filter<T>(event: Event<T>, filter: (e: T) => boolean, disposable?: DisposableStore): Event<T>;
  export function filter<T>(event: Event<T>, filter: (e: T) => boolean, disposable?: DisposableStore): Event<T> {
    return snapshot(
      (listener, thisArgs = null, disposables) =>
        event(e => filter(e) && listener.call(thisArgs, e), null, disposables),
      disposable
    )
  }

  function snapshot<T>(event: Event<T>, disposable?: DisposableStore): Event<T> {
    let listener: IDisposable | undefined
    const emitter = new Emitter<T>({
      onWillAddFirstListener() {
        listener = event(e => emitter.fire(e))
      },
      onDidRemoveLastListener() {
        listener?.dispose()
        listener = undefined
      }
    })
    disposable?.add(emitter)
    return emitter.event
  }

  export function toPromise<T>(event: Event<T>): Promise<T> {
    return new Promise(resolve => once(event)(resolve))
  }

  export interface NodeEventEmitter {
    on(event: string | symbol, listener: (...args: unknown[]) => void): unknown
    removeListener(event: string | symbol, listener: (...args: unknown[]) => void): unknown
  }

  /**
   * Adapts a Node.js style emitter. The underlying listener is only attached
   * while the returned event has listeners of its own.
   */
  export function fromNodeEventEmitter<T>(emitter: NodeEventEmitter, eventName: string, map: (...args: unknown[]) => T): Event<T> {
    const fn = (...args: unknown[]) => result.fire(map(...args))
    const onFirstListenerAdd = () => emitter.on(eventName, fn)
    const onLastListenerRemove = () => emitter.removeListener(eventName, fn)
    const result = new Emitter<T>({ onWillAddFirstListener: onFirstListenerAdd, onDidRemoveLastListener: onLastListenerRemove })
    return result.event
  }
}


export interface EmitterOptions {
  /**
   * Optional function that's called *before* the very first listener is added.
   */
  onWillAddFirstListener?: () => void

  /**
   * Optional function that's called *after* the very first listener is added.
   */
  onDidAddFirstListener?: () => void

  /**
   * Optional function that's called *after* remove the very last listener.
   */
  onDidRemoveLastListener?: () => void

  /**
   * Number of listeners that are allowed before assuming a leak. Default to a
   * global configured value.
   */
  leakWarningThreshold?: number
}


class EventDeliveryQueueElement<T> {
  constructor(
    readonly listener: Listener<T>,
    readonly event: T,
  ) { }
}

/**
 * Listeners of one emitter, queued at the time of `fire`. A listener that fires
 * the same emitter again appends to the queue instead of recursing.
 */
class EventDeliveryQueue<T> {
  private readonly _queue = new LinkedList<EventDeliveryQueueElement<T>>()

  push(listener: Listener<T>, event: T): void {
    this._queue.push(new EventDeliveryQueueElement(listener, event))
  }

  clear(): void {
    this._queue.clear()
  }

  deliver(): void {
    let element = this._queue.shift()
    while (element) {
      try {
        element.listener.invoke(element.event)
      } catch (e) {
        onUnexpectedError(e)
      }
      element = this._queue.shift()
    }
  }
}

export class Emitter<T> implements IDisposable {
  private readonly _options?: EmitterOptions
  private readonly _leakageMon?: LeakageMonitor
  private _disposed = false
  private _event?: Event<T>
  private _deliveryQueue?: EventDeliveryQueue<T>
  private _listeners?: LinkedList<Listener<T>>

  constructor(options?: EmitterOptions) {
    this._options = options
    const threshold = this._options?.leakWarningThreshold ?? _globalLeakWarningThreshold
    this._leakageMon = threshold > 0 ? new LeakageMonitor(threshold) : undefined
    trackDisposable(this)
  }

  get isDisposed(): boolean {
    return this._disposed
  }

  dispose(): void {
    if (!this._disposed) {
      this._disposed = true
      markAsDisposed(this)

      if (this._listeners) {
        for (const listener of this._listeners) {
          listener.subscription.dispose()
        }
        this._listeners.clear()
      }

      this._deliveryQueue?.clear()
      this._options?.onDidRemoveLastListener?.()
      this._leakageMon?.dispose()
    }
  }

  /**
   * For the public to allow to subscribe
   * to events from this Emitter
   */
  get event(): Event<T> {
    if (!this._event) {
      this._event = (callback: (e: T) => unknown, thisArgs?: unknown, disposables?: IDisposable[] | DisposableStore) => {
        if (this._disposed) {
          return Disposable.None
        }
        if (!this._listeners) {
          this._listeners = new LinkedList()
        }

        if (this._leakageMon && this._listeners.size > this._leakageMon.threshold * 3) {
          getLogContext().warn?.(`[${this._leakageMon.name}] REFUSES to accept new listeners because it exceeded its threshold by far`)
          return Disposable.None
        }

        const firstListener = this._listeners.isEmpty()
        if (firstListener) {
          this._options?.onWillAddFirstListener?.()
        }

        let removeMonitor: (() => void) | undefined
        if (this._leakageMon && this._listeners.size >= Math.ceil(this._leakageMon.threshold * .2)) {
          removeMonitor = this._leakageMon.check(Stacktrace.create(), this._listeners.size + 1)
        }

        const listener = new Listener(callback, thisArgs)
        const removeListener = this._listeners.push(listener)

        if (firstListener) {
          this._options?.onDidAddFirstListener?.()
        }

        const result = listener.subscription.set(() => {
          removeMonitor?.()
          if (!this._disposed) {
            removeListener()
            if (this._listeners?.isEmpty()) {
              this._options?.onDidRemoveLastListener?.()
            }
          }
        })

        if (disposables instanceof DisposableStore) {
          disposables.add(result)
        } else if (Array.isArray(disposables)) {
          disposables.push(result)
        }

        return result
      }
    }
    return this._event
  }

  /**
   * To be kept private to fire an event to
   * subscribers
   */
  fire(event: T): void {
    if (this._listeners) {
      if (!this._deliveryQueue) {
        this._deliveryQueue = new EventDeliveryQueue()
      }

      for (const listener of this._listeners) {
        this._deliveryQueue.push(listener, event)
      }

      this._deliveryQueue.deliver()
    }
  }

  hasListeners(): boolean {
    if (!this._listeners) {
      return false
    }

    return !this._listeners.isEmpty()
  }
}


class Listener<T> {
  readonly subscription = new SafeDisposable()

  constructor(
    readonly callback: (e: T) => unknown,
    readonly callbackThis: unknown,
  ) { }

  invoke(e: T): void {
    this.callback.call(this.callbackThis, e)
  }
}

class Stacktrace {
  static create(): Stacktrace {
    return new Stacktrace(new Error().stack ?? '')
  }

  constructor(readonly value: string) { }
}


class LeakageMonitor {
  private _stacks: undefined | Map<string, number>
  private _warnCountdown = 0

  constructor(
    readonly threshold: number,
    readonly name: string = Math.random().toString(18).slice(2, 5)
  ) { }

  dispose(): void {
    this._stacks?.clear()
  }

  check(stack: Stacktrace, listenerCount: number): (() => void) | undefined {
    const threshold = this.threshold
    if (threshold <= 0 || listenerCount < threshold) {
      return undefined
    }

    const stacks = this._stacks ?? (this._stacks = new Map())
    const count = stacks.get(stack.value) || 0
    stacks.set(stack.value, count + 1)
    this._warnCountdown -= 1
    if (this._warnCountdown <= 0) {
      this._warnCountdown = threshold * 0.5

      let topStack: string | undefined
      let topCount = 0

      for (const [stack, count] of stacks) {
        if (!topStack || topCount < count) {
          topStack = stack
          topCount = count
        }
      }
      getLogContext().warn?.(`[${this.name}] potential listener LEAK detected, having ${listenerCount} listeners already. MOST frequent listener (${topCount}):`, topStack)
    }

    return () => {
      const count = stacks.get(stack.value) || 0
      stacks.set(stack.value, count - 1)
    }
  }
}
