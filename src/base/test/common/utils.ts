import { type Context, LogContext, type LogLevel, type LogSink } from '@rocicorp/logger'
import type { IDisposable } from '../../common/lifecycle'
import { setLogContext } from '../../common/log'

export class TestLogSink implements LogSink {
  messages: [LogLevel, Context | undefined, unknown[]][] = []

  log(level: LogLevel, context: Context | undefined, ...args: unknown[]): void {
    this.messages.push([level, context, args])
  }
}

/**
 * Routes all logging into a fresh {@link TestLogSink} at debug level until the
 * returned disposable is disposed.
 */
export function captureLogs(): { sink: TestLogSink } & IDisposable {
  const sink = new TestLogSink()
  const restore = setLogContext(new LogContext('debug', undefined, sink))
  return {
    sink,
    dispose: () => restore.dispose(),
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
