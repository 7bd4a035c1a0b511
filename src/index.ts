export { AsyncObservableValue } from './base/common/asyncObservableValue'
export { AsyncState } from './base/common/asyncState'
export { CancellationToken, CancellationTokenSource } from './base/common/cancellation'
export {
  DisposedResourceError,
  IllegalStateError,
  onUnexpectedError,
  setUnexpectedErrorHandler,
  toErrorMessage,
  type UnexpectedErrorHandler,
} from './base/common/errors'
export { Emitter, Event, setGlobalLeakWarningThreshold, type EmitterOptions } from './base/common/event'
export {
  Disposable,
  DisposableStore,
  DisposableTracker,
  dispose,
  isDisposable,
  markAsSingleton,
  MutableDisposable,
  setDisposableTracker,
  toDisposable,
  type IDisposable,
  type IDisposableTracker,
} from './base/common/lifecycle'
export { getLogContext, setLogContext } from './base/common/log'
export {
  defaultEquals,
  type EqualityComparer,
  type IEquatable,
  type IObservable,
  type Observer,
} from './base/common/observable'
export { ObservableValue, type ObservableValueOptions } from './base/common/observableValue'
export { Owner } from './base/common/owner'
export { subscribe, type Stream, type StreamErrorHandler } from './base/common/stream'
export {
  CancellableTask,
  TaskGroup,
  type TaskErrorHandler,
  type TaskOutcome,
  type TaskWork,
} from './base/common/task'
export { TestScope } from './base/common/testing'
