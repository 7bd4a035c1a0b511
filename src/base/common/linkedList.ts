class Node<E> {
  next: Node<E> | undefined = undefined
  prev: Node<E> | undefined = undefined

  constructor(readonly element: E) { }
}

/**
 * Doubly linked list used for listener storage. Removal through the function
 * returned by {@link push} is O(1) and safe while iterating.
 */
export class LinkedList<E> {
  private _first: Node<E> | undefined = undefined
  private _last: Node<E> | undefined = undefined
  private _size = 0

  get size(): number {
    return this._size
  }

  isEmpty(): boolean {
    return this._first === undefined
  }

  clear(): void {
    let node = this._first
    while (node) {
      const next = node.next
      node.prev = undefined
      node.next = undefined
      node = next
    }

    this._first = undefined
    this._last = undefined
    this._size = 0
  }

  /** Appends `element` and returns a function removing it again. */
  push(element: E): () => void {
    const newNode = new Node(element)
    if (!this._last) {
      this._first = newNode
      this._last = newNode
    } else {
      newNode.prev = this._last
      this._last.next = newNode
      this._last = newNode
    }
    this._size += 1

    let didRemove = false
    return () => {
      if (!didRemove) {
        didRemove = true
        this._remove(newNode)
      }
    }
  }

  shift(): E | undefined {
    const first = this._first
    if (!first) {
      return undefined
    }
    this._remove(first)
    return first.element
  }

  private _remove(node: Node<E>): void {
    if (node !== this._first && !node.prev) {
      // already detached, e.g. by clear()
      return
    }
    if (node.prev) {
      node.prev.next = node.next
    } else {
      this._first = node.next
    }
    if (node.next) {
      node.next.prev = node.prev
    } else {
      this._last = node.prev
    }
    // keep `next` so an iterator positioned on this node can continue
    node.prev = undefined
    this._size -= 1
  }

  *[Symbol.iterator](): Iterator<E> {
    let node = this._first
    while (node) {
      yield node.element
      node = node.next
    }
  }
}
