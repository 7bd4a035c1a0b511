import { type CancellationToken, CancellationTokenSource } from './cancellation'
import { DisposedResourceError, onUnexpectedError } from './errors'
import { type IDisposable, markAsDisposed, trackDisposable } from './lifecycle'
import { getLogContext } from './log'

/**
 * The asynchronous computation behind a task. The token is cancelled together
 * with the task; work may consult it to stop early, but nothing requires it to.
 */
export type TaskWork<T> = (token: CancellationToken) => T | PromiseLike<T>

export type TaskErrorHandler = (error: unknown) => void

/**
 * What a delivery observes once the computation has settled.
 */
export type TaskOutcome<T> =
  | { readonly kind: 'cancelled' }
  | { readonly kind: 'value', readonly value: T }
  | { readonly kind: 'error', readonly error: unknown }

type Settlement<T> =
  | { readonly ok: true, readonly value: T }
  | { readonly ok: false, readonly error: unknown }

/**
 * Handle to one asynchronous computation that can be told to ignore its result.
 *
 * The computation always runs to completion. {@link cancel} only keeps its
 * value or failure from reaching {@link awaitResult} callers, and the flag is
 * checked at the moment of delivery.
 *
 * A task created with a `parent` token is cancelled together with it, for as
 * long as its computation has not settled.
 */
export class CancellableTask<T> implements IDisposable {
  private _isCancelled = false
  private _isCompleted = false
  private readonly _source: CancellationTokenSource
  private readonly _settled: Promise<Settlement<T>>

  constructor(work: TaskWork<T>, parent?: CancellationToken) {
    trackDisposable(this)
    this._source = new CancellationTokenSource(parent)
    const token = this._source.token
    // registered before `work` sees the token, so the flag is set first
    token.onCancellationRequested(() => this._onCancelled())
    this._settled = new Promise<T>(resolve => resolve(work(token))).then<Settlement<T>, Settlement<T>>(
      value => ({ ok: true, value }),
      error => ({ ok: false, error }),
    ).then(settlement => {
      this._isCompleted = true
      this._source.dispose()
      markAsDisposed(this)
      return settlement
    })
  }

  get isCancelled(): boolean {
    return this._isCancelled
  }

  get isCompleted(): boolean {
    return this._isCompleted
  }

  /** Neither cancelled nor completed. */
  get isActive(): boolean {
    return !this._isCancelled && !this._isCompleted
  }

  /**
   * Marks the task as cancelled. Does nothing once the task has completed or
   * was already cancelled.
   */
  cancel(): void {
    if (this._isCancelled || this._isCompleted) {
      return
    }
    this._source.cancel()
  }

  /** Same as {@link cancel}, so that disposable holders can cancel a task. */
  dispose(): void {
    this.cancel()
  }

  /**
   * Waits for the computation. Resolves to its value, or to `undefined` when the
   * task is cancelled by the time the result is delivered. A failure is
   * rethrown unless the task was cancelled, in which case it is swallowed.
   */
  async awaitResult(): Promise<T | undefined> {
    const outcome = await this.outcome()
    switch (outcome.kind) {
      case 'cancelled':
        return undefined
      case 'value':
        return outcome.value
      case 'error':
        throw outcome.error
    }
  }

  /**
   * Waits for the computation and reports what a delivery at that moment sees.
   * Unlike {@link awaitResult} this tells a cancelled task apart from one that
   * produced `undefined`, and never rejects.
   */
  async outcome(): Promise<TaskOutcome<T>> {
    const settlement = await this._settled
    if (this._isCancelled) {
      return { kind: 'cancelled' }
    }
    return settlement.ok
      ? { kind: 'value', value: settlement.value }
      : { kind: 'error', error: settlement.error }
  }

  private _onCancelled(): void {
    if (this._isCompleted) {
      return
    }
    this._isCancelled = true
    markAsDisposed(this)
  }
}

/**
 * Launches {@link CancellableTask tasks} and cancels all of them at once.
 *
 * ```ts
 * const group = new TaskGroup()
 * group.launch(() => fetchUsers())
 * group.launch(() => fetchPosts())
 * group.dispose() // both results are ignored from now on
 * ```
 */
export class TaskGroup implements IDisposable {
  private readonly _tasks = new Set<CancellableTask<unknown>>()
  private _source = new CancellationTokenSource()
  private _isDisposed = false

  get isDisposed(): boolean {
    return this._isDisposed
  }

  /** Number of tracked tasks that have not completed yet. */
  get size(): number {
    return this._tasks.size
  }

  /**
   * Starts `work` and returns its task right away.
   *
   * @throws {DisposedResourceError} when the group has been disposed.
   */
  launch<T>(work: TaskWork<T>): CancellableTask<T> {
    if (this._isDisposed) {
      throw new DisposedResourceError('TaskGroup')
    }
    const task = new CancellableTask(work, this._source.token)
    this._tasks.add(task)
    task.outcome().then(() => this._tasks.delete(task), onUnexpectedError)
    return task
  }

  /**
   * Starts `work` and routes its outcome to the callbacks. `onSuccess` runs
   * for a value other than `undefined` or `null`, unless the task was cancelled
   * or the group disposed by the time the value arrives; `onError` likewise for
   * a failure. Without `onError` failures are dropped.
   */
  launchWith<T>(work: TaskWork<T>, onSuccess: (value: T) => void, onError?: TaskErrorHandler): CancellableTask<T> {
    const task = this.launch(work)
    task.outcome().then(outcome => {
      if (this._isDisposed) {
        return
      }
      switch (outcome.kind) {
        case 'cancelled':
          return
        case 'value':
          if (outcome.value !== undefined && outcome.value !== null) {
            onSuccess(outcome.value)
          }
          return
        case 'error':
          if (onError) {
            onError(outcome.error)
          } else {
            getLogContext().debug?.('Dropped task failure without error handler', outcome.error)
          }
          return
      }
    }).catch(onUnexpectedError)
    return task
  }

  /**
   * Cancels every tracked task and stops tracking them. The group stays usable:
   * later tasks follow a fresh token.
   */
  cancelAll(): void {
    const source = this._source
    this._source = new CancellationTokenSource()
    this._tasks.clear()
    source.dispose(true)
  }

  /**
   * Cancels every tracked task and rejects any further {@link launch}.
   */
  dispose(): void {
    if (this._isDisposed) {
      return
    }
    this._isDisposed = true
    this._tasks.clear()
    this._source.dispose(true)
  }
}
