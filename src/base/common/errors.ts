import type { IDisposable } from './lifecycle'
import { getLogContext } from './log'

/**
 * Raised when an operation is not allowed in the current state of its target.
 */
export class IllegalStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'IllegalStateError'
  }
}

/**
 * Raised when a container, task group or owner is used after it was disposed.
 * Always a programming error in the calling code.
 */
export class DisposedResourceError extends IllegalStateError {
  constructor(what: string) {
    super(`Cannot use ${what} after it has been disposed`)
    this.name = 'DisposedResourceError'
  }
}

export type UnexpectedErrorHandler = (e: unknown) => void

const defaultUnexpectedErrorHandler: UnexpectedErrorHandler = e => {
  getLogContext().error?.('Unexpected error', e)
}

let _unexpectedErrorHandler = defaultUnexpectedErrorHandler

/**
 * Installs the handler for errors that have no caller to propagate to, such as
 * a throwing listener. Disposing the result restores the previous handler.
 */
export function setUnexpectedErrorHandler(handler: UnexpectedErrorHandler): IDisposable {
  const oldValue = _unexpectedErrorHandler
  _unexpectedErrorHandler = handler
  return {
    dispose() {
      _unexpectedErrorHandler = oldValue
    }
  }
}

export function onUnexpectedError(e: unknown): void {
  _unexpectedErrorHandler(e)
}

/**
 * Human readable description of a failure, used as the message of an error state.
 */
export function toErrorMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message
  }
  return String(e)
}
