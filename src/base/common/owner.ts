import type { LogContext } from '@rocicorp/logger'
import { AsyncObservableValue } from './asyncObservableValue'
import { DisposedResourceError, toErrorMessage } from './errors'
import { Emitter, type Event } from './event'
import { Disposable, DisposableStore, type IDisposable } from './lifecycle'
import { getLogContext } from './log'
import { ObservableValue, type ObservableValueOptions } from './observableValue'
import { type Stream, type StreamErrorHandler, subscribe } from './stream'
import { type CancellableTask, type TaskErrorHandler, TaskGroup, type TaskWork } from './task'

/**
 * Base class for business-logic objects whose state, subscriptions and
 * asynchronous work live exactly as long as they do.
 *
 * Containers, subscriptions and tasks created through the protected helpers are
 * released by a single {@link dispose} call, in this order: tasks,
 * subscriptions, {@link register registered} disposables, containers. Task
 * results and stream values that arrive afterwards are ignored.
 *
 * ```ts
 * class ProfileOwner extends Owner {
 *   readonly user = this.createAsyncContainer<User>()
 *
 *   constructor(private readonly _users: UserRepository) {
 *     super()
 *   }
 *
 *   load(id: string) {
 *     this.loadInto(this.user, () => this._users.get(id))
 *   }
 * }
 * ```
 */
export abstract class Owner extends Disposable {
  private readonly _tasks = new TaskGroup()
  private readonly _subscriptions = new DisposableStore()
  private readonly _containers = new DisposableStore()
  private _isDisposed = false

  private readonly _onWillDispose = this._register(new Emitter<void>())
  /** Fires once, when teardown starts. */
  readonly onWillDispose: Event<void> = this._onWillDispose.event

  protected readonly _logContext: LogContext

  protected constructor(lc: LogContext = getLogContext()) {
    super()
    this._logContext = lc.withContext('owner', this.constructor.name)
  }

  get isDisposed(): boolean {
    return this._isDisposed
  }

  /**
   * Releases everything this owner created. Only the first call does anything.
   *
   * Every stage runs even if an earlier one throws; the errors are rethrown at
   * the end.
   */
  override dispose(): void {
    if (this._isDisposed) {
      return
    }
    this._isDisposed = true
    this._logContext.debug?.(`Disposing ${this._tasks.size} tasks, ${this._subscriptions.size} subscriptions, ${this._containers.size} containers`)

    const errors: unknown[] = []
    const stage = (fn: () => void) => {
      try {
        fn()
      } catch (e) {
        errors.push(e)
      }
    }
    stage(() => this._onWillDispose.fire())
    // tasks first: nothing may deliver into a container that is already gone
    stage(() => this._tasks.dispose())
    stage(() => this._subscriptions.dispose())
    stage(() => super.dispose())
    stage(() => this._containers.dispose())

    if (errors.length === 1) {
      throw errors[0]
    } else if (errors.length > 1) {
      throw new AggregateError(errors, `Encountered errors while disposing of ${this.constructor.name}`)
    }
  }

  /**
   * Creates a container that is disposed together with this owner.
   */
  protected createContainer<T>(initial: T, options?: ObservableValueOptions<T>): ObservableValue<T> {
    this._throwIfDisposed()
    return this._containers.add(new ObservableValue(initial, options))
  }

  /**
   * Creates an async container, starting out empty, that is disposed together
   * with this owner.
   */
  protected createAsyncContainer<T>(debugName?: string): AsyncObservableValue<T> {
    this._throwIfDisposed()
    return this._containers.add(new AsyncObservableValue<T>(undefined, debugName))
  }

  /**
   * Subscribes to `source` until this owner is disposed. The callbacks only run
   * while the owner is live. Disposing the result ends the subscription early.
   */
  protected subscribeToStream<T>(source: Stream<T>, onNext: (value: T) => void, onError?: StreamErrorHandler): IDisposable {
    this._throwIfDisposed()
    const subscription = subscribe(
      source,
      value => {
        if (!this._isDisposed) {
          onNext(value)
        }
      },
      onError && (error => {
        if (!this._isDisposed) {
          onError(error)
        }
      }),
    )
    return this._subscriptions.add(subscription)
  }

  /**
   * A container that starts at `initial` and then mirrors `source`, through
   * `transform` when one is given. Stream failures are dropped.
   */
  protected bindContainerToStream<T>(source: Stream<T>, initial: T): ObservableValue<T>
  protected bindContainerToStream<T, R>(source: Stream<T>, initial: R, transform: (value: T) => R): ObservableValue<R>
  protected bindContainerToStream<T, R>(source: Stream<T>, initial: T | R, transform?: (value: T) => R): ObservableValue<T | R> {
    const container = this.createContainer<T | R>(initial)
    this.subscribeToStream(source, value => {
      container.value = transform ? transform(value) : value
    })
    return container
  }

  /**
   * An async container that is `loading` until `source` emits, `data` with each
   * emission and `error` when the stream fails.
   */
  protected bindAsyncContainerToStream<T>(source: Stream<T>): AsyncObservableValue<T>
  protected bindAsyncContainerToStream<T, R>(source: Stream<T>, transform: (value: T) => R): AsyncObservableValue<R>
  protected bindAsyncContainerToStream<T, R>(source: Stream<T>, transform?: (value: T) => R): AsyncObservableValue<T | R> {
    const container = this.createAsyncContainer<T | R>()
    container.setLoading()
    this.subscribeToStream(
      source,
      value => container.setData(transform ? transform(value) : value),
      error => container.setError(toErrorMessage(error), error),
    )
    return container
  }

  /**
   * Starts `work`; its result is ignored once this owner is disposed.
   */
  protected runTask<T>(work: TaskWork<T>): CancellableTask<T> {
    this._throwIfDisposed()
    return this._tasks.launch(work)
  }

  /**
   * Starts `work` and hands its outcome to the callbacks, unless the task was
   * cancelled or this owner disposed before the outcome arrived.
   */
  protected runTaskWith<T>(work: TaskWork<T>, onSuccess: (value: T) => void, onError?: TaskErrorHandler): CancellableTask<T> {
    this._throwIfDisposed()
    return this._tasks.launchWith(work, onSuccess, onError)
  }

  /**
   * Sets `container` to `loading`, runs `work`, and ends in `data` or `error`.
   *
   * To let a newer load supersede an older one, cancel the returned task before
   * starting the next (see {@link MutableDisposable}).
   */
  protected loadInto<T>(container: AsyncObservableValue<T>, work: TaskWork<T>): CancellableTask<T> {
    this._throwIfDisposed()
    container.setLoading()
    return this.runTaskWith(
      work,
      value => container.setData(value),
      error => container.setError(toErrorMessage(error), error),
    )
  }

  /** {@link loadInto}, for retry flows. */
  protected reloadInto<T>(container: AsyncObservableValue<T>, work: TaskWork<T>): CancellableTask<T> {
    return this.loadInto(container, work)
  }

  /**
   * Disposes of `disposable` together with this owner, after subscriptions and
   * before containers.
   */
  protected register<T extends IDisposable>(disposable: T): T {
    this._throwIfDisposed()
    return this._register(disposable)
  }

  private _throwIfDisposed(): void {
    if (this._isDisposed) {
      throw new DisposedResourceError(this.constructor.name)
    }
  }
}
