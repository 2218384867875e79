/**
 * Array-backed binary heap serving the Dijkstra frontier. `pop` returns the
 * entry that `compare` orders first.
 */

export type MinHeapCompare<T> = (a: T, b: T) => number

export class MinHeap<T> {
  private readonly entries: T[] = []

  constructor(private readonly compare: MinHeapCompare<T>) {}

  push(entry: T): void {
    this.entries.push(entry)
    let child = this.entries.length - 1
    while (child > 0) {
      const parent = (child - 1) >> 1
      if (!this.before(child, parent)) break
      this.swap(child, parent)
      child = parent
    }
  }

  /** Removes and returns the first entry; undefined when empty. */
  pop(): T | undefined {
    const last = this.entries.length - 1
    if (last < 0) return undefined
    this.swap(0, last)
    const first = this.entries.pop()

    let parent = 0
    for (;;) {
      const left = parent * 2 + 1
      const right = left + 1
      let smallest = parent
      if (left < last && this.before(left, smallest)) smallest = left
      if (right < last && this.before(right, smallest)) smallest = right
      if (smallest === parent) break
      this.swap(parent, smallest)
      parent = smallest
    }

    return first
  }

  private before(i: number, j: number): boolean {
    const a = this.entries[i]
    const b = this.entries[j]
    return a !== undefined && b !== undefined && this.compare(a, b) < 0
  }

  private swap(i: number, j: number): void {
    const a = this.entries[i]
    const b = this.entries[j]
    if (a === undefined || b === undefined) return
    this.entries[i] = b
    this.entries[j] = a
  }
}
