import type { LogContext } from '@rocicorp/logger'
import { resolver } from '@rocicorp/resolver'
import { afterEach, describe, expect, test, vi } from 'vitest'
import { AsyncObservableValue } from '../../common/asyncObservableValue'
import type { AsyncState } from '../../common/asyncState'
import { DisposedResourceError, IllegalStateError } from '../../common/errors'
import { Emitter, type Event } from '../../common/event'
import {
  DisposableTracker,
  type IDisposable,
  MutableDisposable,
  setDisposableTracker,
  toDisposable,
} from '../../common/lifecycle'
import type { ObservableValue, ObservableValueOptions } from '../../common/observableValue'
import { Owner } from '../../common/owner'
import type { Stream, StreamErrorHandler } from '../../common/stream'
import type { CancellableTask, TaskErrorHandler, TaskWork } from '../../common/task'
import { TestScope } from '../../common/testing'
import { captureLogs, sleep } from './utils'

/**
 * Exposes the protected helpers of {@link Owner} to the tests.
 */
class TestOwner extends Owner {
  constructor(lc?: LogContext) {
    super(lc)
  }

  container<T>(initial: T, options?: ObservableValueOptions<T>): ObservableValue<T> {
    return this.createContainer(initial, options)
  }

  asyncContainer<T>(debugName?: string): AsyncObservableValue<T> {
    return this.createAsyncContainer<T>(debugName)
  }

  listen<T>(source: Stream<T>, onNext: (value: T) => void, onError?: StreamErrorHandler): IDisposable {
    return this.subscribeToStream(source, onNext, onError)
  }

  mirror<T>(source: Stream<T>, initial: T): ObservableValue<T> {
    return this.bindContainerToStream(source, initial)
  }

  mirrorLength(source: Stream<string>): ObservableValue<number> {
    return this.bindContainerToStream(source, 0, s => s.length)
  }

  mirrorAsync<T>(source: Stream<T>): AsyncObservableValue<T> {
    return this.bindAsyncContainerToStream(source)
  }

  mirrorAsyncUpper(source: Stream<string>): AsyncObservableValue<string> {
    return this.bindAsyncContainerToStream(source, s => s.toUpperCase())
  }

  run<T>(work: TaskWork<T>): CancellableTask<T> {
    return this.runTask(work)
  }

  runWith<T>(work: TaskWork<T>, onSuccess: (value: T) => void, onError?: TaskErrorHandler): CancellableTask<T> {
    return this.runTaskWith(work, onSuccess, onError)
  }

  load<T>(container: AsyncObservableValue<T>, work: TaskWork<T>): CancellableTask<T> {
    return this.loadInto(container, work)
  }

  reload<T>(container: AsyncObservableValue<T>, work: TaskWork<T>): CancellableTask<T> {
    return this.reloadInto(container, work)
  }

  keep<T extends IDisposable>(disposable: T): T {
    return this.register(disposable)
  }
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

describe('Owner', () => {
  const scope = new TestScope()

  afterEach(() => {
    scope.dispose()
    setDisposableTracker(null)
    vi.useRealTimers()
  })

  test('a task settling after disposal cannot touch the container', async () => {
    vi.useFakeTimers()
    const owner = scope.create(new TestOwner())
    const count = owner.container(0)
    owner.run(async () => {
      await delay(100)
      count.value = 1
    })
    const onSuccess = vi.fn((value: number) => {
      count.value = value
    })
    owner.runWith(async () => {
      await delay(100)
      return 2
    }, onSuccess)

    await vi.advanceTimersByTimeAsync(10)
    owner.dispose()
    await vi.advanceTimersByTimeAsync(140)

    expect(count.value).toBe(0)
    expect(onSuccess).not.toHaveBeenCalled()
    expect(() => {
      count.value = 5
    }).toThrow(DisposedResourceError)
  })

  test('loadInto ends in data', async () => {
    const owner = scope.create(new TestOwner())
    const user = owner.asyncContainer<string>()
    const { promise, resolve } = resolver<string>()

    owner.load(user, () => promise)
    expect(user.isLoading).toBe(true)

    resolve('ada')
    await sleep(0)

    expect(user.value).toEqual({ kind: 'data', value: 'ada' })
  })

  test('loadInto leaves the container loading when the work produces no value', async () => {
    const owner = scope.create(new TestOwner())
    const user = owner.asyncContainer<string | undefined>()

    const task = owner.load(user, () => undefined)
    await sleep(0)

    expect(await task.outcome()).toEqual({ kind: 'value', value: undefined })
    expect(user.isLoading).toBe(true)
  })

  test('loadInto ends in error with the failure as cause', async () => {
    const owner = scope.create(new TestOwner())
    const user = owner.asyncContainer<string>()
    const failure = new Error('boom')

    owner.load(user, () => {
      throw failure
    })
    await sleep(0)

    expect(user.value).toEqual({ kind: 'error', message: 'boom', cause: failure })
    expect(user.errorMessage).toContain('boom')
  })

  test('a failure that is not an Error is described as a string', async () => {
    const owner = scope.create(new TestOwner())
    const user = owner.asyncContainer<string>()

    owner.load(user, () => Promise.reject('offline'))
    await sleep(0)

    expect(user.value).toEqual({ kind: 'error', message: 'offline', cause: 'offline' })
  })

  test('reloadInto goes through loading again', async () => {
    const owner = scope.create(new TestOwner())
    const user = owner.asyncContainer<string>()
    const states: AsyncState.Kind[] = []
    user.addObserver(() => states.push(user.value.kind))

    owner.load(user, () => Promise.reject(new Error('offline')))
    await sleep(0)
    owner.reload(user, () => 'ada')
    await sleep(0)

    expect(states).toEqual(['loading', 'error', 'loading', 'data'])
    expect(user.data).toBe('ada')
  })

  test('a superseded load is ignored', async () => {
    const owner = scope.create(new TestOwner())
    const user = owner.asyncContainer<string>()
    const latest = owner.keep(new MutableDisposable<CancellableTask<string>>())
    const states: AsyncState<string>[] = []
    user.addObserver(() => states.push(user.value))
    const first = resolver<string>()
    const second = resolver<string>()

    latest.value = owner.load(user, () => first.promise)
    const superseded = latest.value
    latest.value = owner.load(user, () => second.promise)
    second.resolve('second')
    first.resolve('first')
    await sleep(0)

    expect(superseded?.isCancelled).toBe(true)
    expect(user.data).toBe('second')
    expect(states).toEqual([{ kind: 'loading' }, { kind: 'data', value: 'second' }])
  })

  test('a superseded load settling last is ignored too', async () => {
    const owner = scope.create(new TestOwner())
    const user = owner.asyncContainer<string>()
    const latest = owner.keep(new MutableDisposable<CancellableTask<string>>())
    const first = resolver<string>()
    const second = resolver<string>()

    latest.value = owner.load(user, () => first.promise)
    latest.value = owner.load(user, () => second.promise)
    second.resolve('second')
    await sleep(0)
    first.reject(new Error('stale failure'))
    await sleep(0)

    expect(user.value).toEqual({ kind: 'data', value: 'second' })
  })

  test('disposal leaves containers frozen and rejects writes', async () => {
    const owner = scope.create(new TestOwner())
    const user = owner.asyncContainer<string>()
    const count = owner.container(1)
    const { promise, resolve } = resolver<string>()
    owner.load(user, () => promise)

    owner.dispose()
    resolve('too late')
    await sleep(0)

    expect(user.isLoading).toBe(true)
    expect(user.isDisposed).toBe(true)
    expect(count.isDisposed).toBe(true)
    expect(() => user.setData('x')).toThrow(DisposedResourceError)
    expect(() => count.update(x => x + 1)).toThrow(DisposedResourceError)
  })

  test('tears down tasks, then subscriptions, then registered disposables, then containers', () => {
    const owner = new TestOwner()
    const count = owner.container(0)
    const order: string[] = []
    const record = (stage: string) => order.push(`${stage}:${count.isDisposed}`)
    const source: Event<number> = () => toDisposable(() => record('subscription'))

    owner.onWillDispose(() => record('willDispose'))
    owner.run(token => {
      token.onCancellationRequested(() => record('task'))
      return resolver<number>().promise
    })
    owner.listen(source, vi.fn())
    owner.keep(toDisposable(() => record('registered')))

    owner.dispose()

    expect(order).toEqual([
      'willDispose:false',
      'task:false',
      'subscription:false',
      'registered:false',
    ])
    expect(count.isDisposed).toBe(true)
  })

  test('dispose runs once', () => {
    const owner = new TestOwner()
    const onWillDispose = vi.fn()
    const cleanup = vi.fn()
    owner.onWillDispose(onWillDispose)
    owner.keep(toDisposable(cleanup))

    owner.dispose()
    owner.dispose()

    expect(owner.isDisposed).toBe(true)
    expect(onWillDispose).toHaveBeenCalledTimes(1)
    expect(cleanup).toHaveBeenCalledTimes(1)
  })

  test('every helper refuses to create resources after disposal', () => {
    const owner = new TestOwner()
    const emitter = new Emitter<string>()
    const user = new AsyncObservableValue<string>()
    owner.dispose()

    expect(() => owner.container(0)).toThrow('Cannot use TestOwner after it has been disposed')
    expect(() => owner.asyncContainer()).toThrow(DisposedResourceError)
    expect(() => owner.listen(emitter.event, vi.fn())).toThrow(DisposedResourceError)
    expect(() => owner.mirror(emitter.event, '')).toThrow(DisposedResourceError)
    expect(() => owner.mirrorAsync(emitter.event)).toThrow(DisposedResourceError)
    expect(() => owner.run(() => 1)).toThrow(DisposedResourceError)
    expect(() => owner.runWith(() => 1, vi.fn())).toThrow(IllegalStateError)
    expect(() => owner.load(user, () => 'x')).toThrow(DisposedResourceError)
    expect(() => owner.keep(toDisposable(() => undefined))).toThrow(DisposedResourceError)
    expect(user.isEmpty).toBe(true)
    expect(emitter.hasListeners()).toBe(false)
  })

  test('subscriptions deliver until disposal', () => {
    const owner = new TestOwner()
    const emitter = new Emitter<number>()
    const seen: number[] = []
    owner.listen(emitter.event, value => seen.push(value))

    emitter.fire(1)
    owner.dispose()
    emitter.fire(2)

    expect(seen).toEqual([1])
    expect(emitter.hasListeners()).toBe(false)
  })

  test('a subscription can be ended early', () => {
    const owner = scope.create(new TestOwner())
    const emitter = new Emitter<number>()
    const seen: number[] = []
    const subscription = owner.listen(emitter.event, value => seen.push(value))

    subscription.dispose()
    emitter.fire(1)

    expect(seen).toEqual([])
  })

  test('a subscription delivering from an async iterable stops on disposal', async () => {
    const owner = new TestOwner()
    const { promise, resolve } = resolver<void>()
    const seen: number[] = []
    async function* source() {
      yield 1
      await promise
      yield 2
    }
    owner.listen(source(), value => seen.push(value))
    await sleep(0)

    owner.dispose()
    resolve()
    await sleep(0)

    expect(seen).toEqual([1])
  })

  test('bindContainerToStream mirrors the stream', () => {
    const owner = scope.create(new TestOwner())
    const emitter = new Emitter<string>()
    const plain = owner.mirror(emitter.event, 'none')
    const length = owner.mirrorLength(emitter.event)

    expect(plain.value).toBe('none')
    expect(length.value).toBe(0)

    emitter.fire('hello')

    expect(plain.value).toBe('hello')
    expect(length.value).toBe(5)
  })

  test('bindAsyncContainerToStream is loading until the first value', () => {
    const owner = scope.create(new TestOwner())
    const emitter = new Emitter<string>()
    const plain = owner.mirrorAsync(emitter.event)
    const upper = owner.mirrorAsyncUpper(emitter.event)

    expect(plain.isLoading).toBe(true)

    emitter.fire('ada')

    expect(plain.data).toBe('ada')
    expect(upper.data).toBe('ADA')
  })

  test('bindAsyncContainerToStream turns a stream failure into an error state', async () => {
    const owner = scope.create(new TestOwner())
    const failure = new Error('feed closed')
    async function* feed() {
      yield 'first'
      throw failure
    }

    const latest = owner.mirrorAsync(feed())
    await sleep(0)

    expect(latest.value).toEqual({ kind: 'error', message: 'feed closed', cause: failure })
  })

  test('logs the teardown at debug level', () => {
    const logs = captureLogs()
    try {
      const owner = new TestOwner()
      const emitter = new Emitter<number>()
      owner.container(0)
      owner.listen(emitter.event, vi.fn())
      owner.run(() => resolver<number>().promise)

      owner.dispose()

      expect(logs.sink.messages).toEqual([
        ['debug', expect.objectContaining({ owner: 'TestOwner' }), ['Disposing 1 tasks, 1 subscriptions, 1 containers']],
      ])
    } finally {
      logs.dispose()
    }
  })

  test('rethrows teardown failures after every stage ran', () => {
    const owner = new TestOwner()
    const count = owner.container(0)
    const failure = new Error('cleanup failed')
    owner.keep(toDisposable(() => {
      throw failure
    }))

    expect(() => owner.dispose()).toThrow(failure)
    expect(count.isDisposed).toBe(true)
    expect(owner.isDisposed).toBe(true)
  })

  test('aggregates several teardown failures', () => {
    const owner = new TestOwner()
    const a = new Error('a')
    const b = new Error('b')
    owner.listen(() => toDisposable(() => {
      throw a
    }), vi.fn())
    owner.keep(toDisposable(() => {
      throw b
    }))
    let thrown: unknown

    try {
      owner.dispose()
    } catch (e) {
      thrown = e
    }

    expect(thrown).toBeInstanceOf(AggregateError)
    expect(thrown instanceof AggregateError && thrown.errors).toEqual([a, b])
    expect(thrown instanceof AggregateError && thrown.message).toBe('Encountered errors while disposing of TestOwner')
  })

  test('leaves nothing behind once disposed', () => {
    const emitter = new Emitter<number>()
    const tracker = new DisposableTracker()
    setDisposableTracker(tracker)
    const owner = new TestOwner()
    const count = owner.container(0)
    count.addObserver(vi.fn())
    owner.listen(emitter.event, vi.fn())
    owner.keep(toDisposable(() => undefined))
    owner.onWillDispose(() => undefined)

    expect(tracker.computeLeakingDisposables()).toContain(owner)

    owner.dispose()

    expect(tracker.computeLeakingDisposables()).toEqual([])
  })

  test('leaves no task or token behind once disposed', async () => {
    const tracker = new DisposableTracker()
    setDisposableTracker(tracker)
    const owner = new TestOwner()
    const user = owner.asyncContainer<string>()
    const latest = owner.keep(new MutableDisposable<CancellableTask<string>>())
    const finished = owner.run(() => 'done')
    await finished.awaitResult()

    latest.value = owner.load(user, () => resolver<string>().promise)
    const pending = owner.load(user, () => resolver<string>().promise)
    latest.value = pending

    owner.dispose()

    expect(pending.isCancelled).toBe(true)
    expect(tracker.computeLeakingDisposables()).toEqual([])
  })
})

describe('TestScope', () => {
  test('disposes tracked owners in creation order and forgets them', () => {
    const scope = new TestScope()
    const order: string[] = []
    const first = scope.create(new TestOwner())
    const second = scope.create(new TestOwner())
    first.onWillDispose(() => order.push('first'))
    second.onWillDispose(() => order.push('second'))

    scope.dispose()
    scope.dispose()

    expect(order).toEqual(['first', 'second'])
    expect(first.isDisposed).toBe(true)
    expect(second.isDisposed).toBe(true)
  })
})
