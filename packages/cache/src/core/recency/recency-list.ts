/**
 * Stable index of a node inside a {@link RecencyList}. Valid until the node
 * is removed; the slot may then be handed out again.
 */
export type RecencyHandle = number

const NIL: RecencyHandle = -1

type RecencyNode<T> = {
  item: T | undefined
  prev: RecencyHandle
  next: RecencyHandle
}

/**
 * Doubly-linked list threaded through an array of nodes by index.
 *
 * Front is the most recently used item, back the least recently used one.
 * Removed slots go onto a free list and are reused by later inserts, so the
 * arena never grows past the peak number of live items.
 */
export class RecencyList<T extends object> {
  private readonly nodes: RecencyNode<T>[] = []
  private readonly free: RecencyHandle[] = []
  private head: RecencyHandle = NIL
  private tail: RecencyHandle = NIL
  private count = 0

  get length(): number {
    return this.count
  }

  pushFront(item: T): RecencyHandle {
    const handle = this.allocate(item)

    this.linkFront(handle)
    this.count++

    return handle
  }

  moveToFront(handle: RecencyHandle): void {
    this.get(handle)

    if (handle === this.head) return

    this.unlink(handle)
    this.linkFront(handle)
  }

  remove(handle: RecencyHandle): T {
    const item = this.get(handle)

    this.unlink(handle)
    this.nodeAt(handle).item = undefined
    this.free.push(handle)
    this.count--

    return item
  }

  get(handle: RecencyHandle): T {
    const item = this.nodeAt(handle).item

    if (item === undefined) {
      throw new Error(`Invariant violation: recency handle ${handle} was already removed`)
    }

    return item
  }

  /** Handle of the least recently used item. */
  back(): RecencyHandle | undefined {
    return this.tail === NIL ? undefined : this.tail
  }

  /** Items from most to least recently used, as a new array. */
  toArray(): T[] {
    const out: T[] = []

    for (let handle = this.head; handle !== NIL; handle = this.nodeAt(handle).next) {
      out.push(this.get(handle))
    }

    return out
  }

  private allocate(item: T): RecencyHandle {
    const reused = this.free.pop()

    if (reused === undefined) {
      this.nodes.push({ item, prev: NIL, next: NIL })

      return this.nodes.length - 1
    }

    this.nodeAt(reused).item = item

    return reused
  }

  private linkFront(handle: RecencyHandle): void {
    const node = this.nodeAt(handle)

    node.prev = NIL
    node.next = this.head

    if (this.head === NIL) {
      this.tail = handle
    } else {
      this.nodeAt(this.head).prev = handle
    }

    this.head = handle
  }

  private unlink(handle: RecencyHandle): void {
    const node = this.nodeAt(handle)

    if (node.prev === NIL) {
      this.head = node.next
    } else {
      this.nodeAt(node.prev).next = node.next
    }

    if (node.next === NIL) {
      this.tail = node.prev
    } else {
      this.nodeAt(node.next).prev = node.prev
    }

    node.prev = NIL
    node.next = NIL
  }

  private nodeAt(handle: RecencyHandle): RecencyNode<T> {
    const node = this.nodes[handle]

    if (node === undefined) {
      throw new Error(`Invariant violation: unknown recency handle ${handle}`)
    }

    return node
  }
}
