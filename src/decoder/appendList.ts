interface Node<T> {
  readonly value: T
  readonly prev: Node<T> | null
  readonly length: number
  cache?: readonly T[]
}

/**
 * Persistent append-only sequence.
 * Every push returns a new list that shares its whole prefix with the receiver,
 * so branching N children off one parent costs O(N) instead of O(N * length).
 */
export class AppendList<T> {
  private constructor(private readonly tail: Node<T> | null) {}

  static empty<T>(): AppendList<T> {
    return new AppendList<T>(null)
  }

  static from<T>(items: Iterable<T>): AppendList<T> {
    let list = AppendList.empty<T>()
    for (const item of items) list = list.push(item)
    return list
  }

  get length(): number {
    return this.tail ? this.tail.length : 0
  }

  push(item: T): AppendList<T> {
    return new AppendList({ value: item, prev: this.tail, length: this.length + 1 })
  }

  /** Last element, or undefined when empty */
  last(): T | undefined {
    return this.tail?.value
  }

  /**
   * Materialize as a frozen array, cached on the tail node.
   * Walks back only until the nearest node that already holds a cache.
   */
  toArray(): readonly T[] {
    const tail = this.tail
    if (!tail) return []
    if (tail.cache) return tail.cache
    const pending: T[] = []
    let node: Node<T> | null = tail
    while (node && !node.cache) {
      pending.push(node.value)
      node = node.prev
    }
    const out: T[] = node?.cache ? node.cache.slice() : []
    for (let i = pending.length - 1; i >= 0; i--) out.push(pending[i]!)
    tail.cache = Object.freeze(out)
    return tail.cache
  }
}
