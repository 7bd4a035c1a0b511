import { consoleLogSink, LogContext } from '@rocicorp/logger'
import type { IDisposable } from './lifecycle'

let _logContext = new LogContext('info', undefined, consoleLogSink)

/**
 * The log context every owner, store and emitter derives its own context from.
 */
export function getLogContext(): LogContext {
  return _logContext
}

/**
 * Replaces the process-wide log context. Disposing the result restores the
 * previous one.
 */
export function setLogContext(lc: LogContext): IDisposable {
  const oldValue = _logContext
  _logContext = lc
  return {
    dispose() {
      _logContext = oldValue
    }
  }
}
