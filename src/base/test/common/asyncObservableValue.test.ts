import { describe, expect, test, vi } from 'vitest'
import { AsyncObservableValue } from '../../common/asyncObservableValue'
import { AsyncState } from '../../common/asyncState'
import { DisposedResourceError } from '../../common/errors'

class Point {
  constructor(readonly x: number, readonly y: number) {}

  equals(other: Point): boolean {
    return this.x === other.x && this.y === other.y
  }
}

describe('AsyncObservableValue', () => {
  test('starts empty', () => {
    const user = new AsyncObservableValue<string>()

    expect(user.value).toEqual(AsyncState.empty())
    expect(user.isEmpty).toBe(true)
    expect(user.data).toBeUndefined()
    expect(user.errorMessage).toBeUndefined()
  })

  test('static constructors', () => {
    expect(AsyncObservableValue.loading<number>().isLoading).toBe(true)
    expect(AsyncObservableValue.withData(8).data).toBe(8)
  })

  test('walks through the states and notifies on each change', () => {
    const user = new AsyncObservableValue<string>()
    const states: AsyncState<string>[] = []
    user.addObserver(() => states.push(user.value))
    const cause = new Error('offline')

    user.setLoading()
    user.setData('ada')
    user.setError('offline', cause)
    user.setEmpty()

    expect(states).toEqual([
      { kind: 'loading' },
      { kind: 'data', value: 'ada' },
      { kind: 'error', message: 'offline', cause },
      { kind: 'empty' },
    ])
  })

  test('setting an equal state does not notify', () => {
    const user = new AsyncObservableValue<string>()
    const observer = vi.fn()
    user.addObserver(observer)

    user.setLoading()
    user.setLoading()
    user.setData('ada')
    user.setData('ada')
    user.setError('offline')
    user.setError('offline')

    expect(observer).toHaveBeenCalledTimes(3)
  })

  test('setting equatable data that equals the current data does not notify', () => {
    const position = new AsyncObservableValue<Point>()
    const observer = vi.fn()
    position.addObserver(observer)

    position.setData(new Point(1, 2))
    position.setData(new Point(1, 2))
    position.setData(new Point(2, 2))

    expect(observer).toHaveBeenCalledTimes(2)
    expect(position.data).toEqual(new Point(2, 2))
  })

  test('getters follow the state', () => {
    const user = new AsyncObservableValue<string>()

    user.setError('offline')
    expect(user.hasError).toBe(true)
    expect(user.errorMessage).toBe('offline')

    user.setData('ada')
    expect(user.hasData).toBe(true)
    expect(user.hasError).toBe(false)
    expect(user.data).toBe('ada')
  })

  test('any transition is allowed', () => {
    const user = AsyncObservableValue.withData('ada')

    user.setEmpty()
    user.setError('late failure')
    user.setData('grace')

    expect(user.data).toBe('grace')
  })

  test('a disposed container rejects transitions', () => {
    const user = new AsyncObservableValue<string>()
    user.dispose()

    expect(() => user.setLoading()).toThrow(DisposedResourceError)
    expect(() => user.setData('ada')).toThrow('Cannot use AsyncObservableValue after it has been disposed')
    expect(user.isEmpty).toBe(true)
  })
})
