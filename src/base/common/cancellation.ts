import { Emitter, Event } from './event'
import type { IDisposable } from './lifecycle'

/**
 * Handed to task work so that it can notice when its result is no longer
 * wanted. Checking it is optional: a cancelled task ignores its result either
 * way.
 */
export interface CancellationToken {
  readonly isCancellationRequested: boolean

  /**
   * Fires once, when cancellation is requested. A listener added after that
   * is called on the next turn of the event loop.
   *
   * @event
   */
  readonly onCancellationRequested: Event<void>
}

const alreadyCancelled: Event<void> = Object.freeze(function (callback: (e: void) => unknown, context?: unknown): IDisposable {
  const handle = setTimeout(() => callback.call(context, undefined), 0)
  return { dispose() { clearTimeout(handle) } }
})

export namespace CancellationToken {
  export const None = Object.freeze<CancellationToken>({
    isCancellationRequested: false,
    onCancellationRequested: Event.None
  })

  export const Cancelled = Object.freeze<CancellationToken>({
    isCancellationRequested: true,
    onCancellationRequested: alreadyCancelled
  })
}

class SourceToken implements CancellationToken {
  private _isCancelled = false
  private _onCancellationRequested: Emitter<void> | undefined

  get isCancellationRequested(): boolean {
    return this._isCancelled
  }

  get onCancellationRequested(): Event<void> {
    if (this._isCancelled) {
      return alreadyCancelled
    }
    if (!this._onCancellationRequested) {
      this._onCancellationRequested = new Emitter<void>()
    }
    return this._onCancellationRequested.event
  }

  cancel(): void {
    if (this._isCancelled) {
      return
    }
    this._isCancelled = true
    this._onCancellationRequested?.fire()
    this.dispose()
  }

  dispose(): void {
    this._onCancellationRequested?.dispose()
    this._onCancellationRequested = undefined
  }
}

/**
 * Issues one {@link CancellationToken} and cancels it on demand.
 *
 * A source created with a parent token follows it: a `TaskGroup` hands
 * its own token to every task it launches, so cancelling the group's source
 * cancels the token of each task still running.
 */
export class CancellationTokenSource implements IDisposable {
  private _token: CancellationToken | undefined
  private readonly _parentListener: IDisposable | undefined

  constructor(parent?: CancellationToken) {
    this._parentListener = parent?.onCancellationRequested(() => this.cancel())
  }

  get token(): CancellationToken {
    if (!this._token) {
      this._token = new SourceToken()
    }
    return this._token
  }

  cancel(): void {
    if (!this._token) {
      this._token = CancellationToken.Cancelled
    } else if (this._token instanceof SourceToken) {
      this._token.cancel()
    }
  }

  /**
   * Stops following the parent and releases the token's listeners. With
   * `cancel` the token is cancelled first.
   */
  dispose(cancel = false): void {
    if (cancel) {
      this.cancel()
    }
    this._parentListener?.dispose()
    if (!this._token) {
      this._token = CancellationToken.None
    } else if (this._token instanceof SourceToken) {
      this._token.dispose()
    }
  }
}
