/**
 * vertex-keys.ts — Vertex identity for the search engine.
 *
 * Vertices are opaque. Two vertices are the same when their keys are equal
 * under SameValueZero (the `Map` rule). The default key is the vertex itself,
 * which suits primitives and interned objects; value-like objects such as grid
 * cells need a `keyOf` that maps them to a primitive.
 */

/** Maps a vertex to the value that identifies it. */
export type KeyOf<V> = (vertex: V) => unknown

export const identityKey: KeyOf<unknown> = (vertex) => vertex

/** Query side of a {@link VertexSet}. */
export interface ReadonlyVertexSet<V> extends Iterable<V> {
  readonly keyOf: KeyOf<V>
  readonly size: number
  has(vertex: V): boolean
  containsAll(other: Iterable<V>): boolean
  values(): IterableIterator<V>
  toArray(): V[]
}

/** Set of vertices keyed by `keyOf`. Iterates in insertion order. */
export class VertexSet<V> implements ReadonlyVertexSet<V> {
  private readonly items = new Map<unknown, V>()

  constructor(
    readonly keyOf: KeyOf<V> = identityKey,
    initial: Iterable<V> = [],
  ) {
    for (const vertex of initial) this.add(vertex)
  }

  get size(): number {
    return this.items.size
  }

  has(vertex: V): boolean {
    return this.items.has(this.keyOf(vertex))
  }

  /** Adds `vertex`; returns false when an equal vertex was already present. */
  add(vertex: V): boolean {
    const key = this.keyOf(vertex)
    if (this.items.has(key)) return false
    this.items.set(key, vertex)
    return true
  }

  /** True when every vertex of `other` is in this set. */
  containsAll(other: Iterable<V>): boolean {
    for (const vertex of other) {
      if (!this.has(vertex)) return false
    }
    return true
  }

  values(): IterableIterator<V> {
    return this.items.values()
  }

  [Symbol.iterator](): IterableIterator<V> {
    return this.items.values()
  }

  toArray(): V[] {
    return [...this.items.values()]
  }
}

/** Map from vertices (keyed by `keyOf`) to values. */
export class VertexMap<V, T> {
  private readonly items = new Map<unknown, T>()

  constructor(readonly keyOf: KeyOf<V> = identityKey) {}

  get size(): number {
    return this.items.size
  }

  has(vertex: V): boolean {
    return this.items.has(this.keyOf(vertex))
  }

  get(vertex: V): T | undefined {
    return this.items.get(this.keyOf(vertex))
  }

  set(vertex: V, value: T): void {
    this.items.set(this.keyOf(vertex), value)
  }
}

/** True when `a` and `b` identify the same vertex under `keyOf`. */
export function sameVertex<V>(keyOf: KeyOf<V>, a: V, b: V): boolean {
  const ka = keyOf(a)
  const kb = keyOf(b)
  return ka === kb || (ka !== ka && kb !== kb)
}
