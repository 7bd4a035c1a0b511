import { onUnexpectedError } from './errors'
import type { Event } from './event'
import { type IDisposable, toDisposable } from './lifecycle'
import { getLogContext } from './log'

/**
 * An external source of values: an {@link Event}, which cannot fail, or an
 * async iterable, whose failure ends the subscription.
 */
export type Stream<T> = Event<T> | AsyncIterable<T>

export type StreamErrorHandler = (error: unknown) => void

function isAsyncIterable<T>(source: Stream<T>): source is AsyncIterable<T> {
  return typeof source === 'object' && source !== null && Symbol.asyncIterator in source
}

/**
 * Subscribes to `source`. After the returned disposable is disposed neither
 * callback runs again. Without `onError` a stream failure is dropped.
 */
export function subscribe<T>(source: Stream<T>, onNext: (value: T) => void, onError?: StreamErrorHandler): IDisposable {
  if (isAsyncIterable(source)) {
    return subscribeToIterable(source, onNext, onError)
  }
  return source(onNext)
}

function subscribeToIterable<T>(source: AsyncIterable<T>, onNext: (value: T) => void, onError?: StreamErrorHandler): IDisposable {
  const iterator = source[Symbol.asyncIterator]()
  let isDisposed = false

  const pump = async () => {
    for (;;) {
      let result: IteratorResult<T>
      try {
        result = await iterator.next()
      } catch (e) {
        if (isDisposed) {
          return
        }
        if (onError) {
          onError(e)
        } else {
          getLogContext().debug?.('Dropped stream failure without error handler', e)
        }
        return
      }
      if (isDisposed || result.done) {
        return
      }
      try {
        onNext(result.value)
      } catch (e) {
        onUnexpectedError(e)
      }
    }
  }
  pump().catch(onUnexpectedError)

  return toDisposable(() => {
    isDisposed = true
    if (iterator.return) {
      Promise.resolve(iterator.return()).catch(onUnexpectedError)
    }
  })
}
