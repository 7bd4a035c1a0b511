import type { IDisposable } from './lifecycle'

/**
 * Keeps track of owners created by a test so that they can be disposed of in
 * one `afterEach`.
 *
 * ```ts
 * const scope = new TestScope()
 * afterEach(() => scope.dispose())
 *
 * test('loads the profile', async () => {
 *   const owner = scope.create(new ProfileOwner(fakeUsers))
 *   // ...
 * })
 * ```
 */
export class TestScope implements IDisposable {
  private readonly _owners: IDisposable[] = []

  /** Tracks `owner` and returns it. */
  create<T extends IDisposable>(owner: T): T {
    this._owners.push(owner)
    return owner
  }

  /** Disposes of every tracked owner, in creation order, and forgets them. */
  dispose(): void {
    const owners = this._owners.splice(0)
    for (const owner of owners) {
      owner.dispose()
    }
  }
}
