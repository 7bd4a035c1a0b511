import { AsyncState } from './asyncState'
import { ObservableValue } from './observableValue'

/**
 * An {@link ObservableValue} holding an {@link AsyncState}, with setters for
 * each transition. Assigning a state equal to the current one (for example
 * `setLoading()` twice) does not notify.
 *
 * Nothing here is aware of tasks or cancellation; an owner decides when the
 * setters run.
 */
export class AsyncObservableValue<T> extends ObservableValue<AsyncState<T>> {
  static loading<T>(debugName?: string): AsyncObservableValue<T> {
    return new AsyncObservableValue<T>(AsyncState.loading(), debugName)
  }

  static withData<T>(value: T, debugName?: string): AsyncObservableValue<T> {
    return new AsyncObservableValue<T>(AsyncState.data(value), debugName)
  }

  constructor(initial: AsyncState<T> = AsyncState.empty(), debugName = 'AsyncObservableValue') {
    super(initial, { equals: AsyncState.equals, debugName })
  }

  get isLoading(): boolean {
    return AsyncState.isLoading(this.value)
  }

  get hasError(): boolean {
    return AsyncState.hasError(this.value)
  }

  get hasData(): boolean {
    return AsyncState.hasData(this.value)
  }

  get isEmpty(): boolean {
    return AsyncState.isEmpty(this.value)
  }

  /** The value of a `data` state, otherwise `undefined`. */
  get data(): T | undefined {
    return AsyncState.dataOrUndefined(this.value)
  }

  /** The message of an `error` state, otherwise `undefined`. */
  get errorMessage(): string | undefined {
    return AsyncState.errorMessageOrUndefined(this.value)
  }

  setLoading(): void {
    this.value = AsyncState.loading()
  }

  setData(value: T): void {
    this.value = AsyncState.data(value)
  }

  setError(message: string, cause?: unknown): void {
    this.value = AsyncState.error(message, cause)
  }

  setEmpty(): void {
    this.value = AsyncState.empty()
  }
}
