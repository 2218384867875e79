/**
 * path.ts — The result of a successful search.
 *
 * Invariants:
 * - `vertices[i]` is a neighbor of `vertices[i - 1]` in the searched graph.
 * - A one-vertex path has the same start and target.
 * - An empty path has neither start nor target.
 * - `visited` contains every vertex of `vertices`.
 */

import type { WeightFn } from './neighbor-source.js'
import { VertexSet } from './vertex-keys.js'
import type { ReadonlyVertexSet } from './vertex-keys.js'

/** How a path renders itself in `toString()`. */
export interface PathFormat<V> {
  /** Vertices printed at each end of a long path. */
  readonly displayCut: number
  readonly weightDecimals: number
  readonly label: (vertex: V) => string
}

export const DEFAULT_PATH_FORMAT: PathFormat<unknown> = {
  displayCut: 10,
  weightDecimals: 2,
  label: (vertex) => String(vertex),
}

export class GraphPath<V> {
  /**
   * Vertices inspected by the search that produced this path. Diagnostic
   * only. The path holds its own copy; later changes to the set passed in
   * do not reach it.
   */
  readonly visited: ReadonlyVertexSet<V>
  private readonly ordered: readonly V[]
  private weight: number

  constructor(
    vertices: Iterable<V>,
    visited: ReadonlyVertexSet<V>,
    totalWeight = 0,
    private readonly format: PathFormat<V> = DEFAULT_PATH_FORMAT,
  ) {
    this.ordered = [...vertices]
    this.visited = new VertexSet(visited.keyOf, visited)
    this.weight = totalWeight
  }

  get vertices(): readonly V[] {
    return this.ordered
  }

  get length(): number {
    return this.ordered.length
  }

  get isEmpty(): boolean {
    return this.ordered.length === 0
  }

  get start(): V | undefined {
    return this.ordered[0]
  }

  get target(): V | undefined {
    return this.ordered[this.ordered.length - 1]
  }

  get totalWeight(): number {
    return this.weight
  }

  /**
   * Re-derives `totalWeight` by summing `weightFn` over each pair of
   * consecutive vertices. The first vertex has no predecessor and adds nothing.
   */
  recalculateTotalWeight(weightFn: WeightFn<V>): number {
    let total = 0
    for (let i = 1; i < this.ordered.length; i++) {
      const from = this.ordered[i - 1]
      const to = this.ordered[i]
      if (from === undefined || to === undefined) continue
      total += weightFn(from, to)
    }
    this.weight = total
    return total
  }

  /**
   * `Weight=2.00 Length=3 visited=4 (A, B, C)`. Paths longer than twice the
   * display cut keep the first and last `displayCut` vertices around a "...".
   */
  toString(): string {
    const { displayCut, weightDecimals, label } = this.format
    const count = this.ordered.length
    const tailCut = count - 1 - displayCut
    const parts: string[] = []

    this.ordered.forEach((vertex, i) => {
      if (i < displayCut || i > tailCut) {
        parts.push(label(vertex))
      } else if (i === displayCut) {
        parts.push('...')
      }
    })

    return (
      `Weight=${this.weight.toFixed(weightDecimals)} Length=${count} visited=${this.visited.size} ` +
      `(${parts.join(', ')})`
    )
  }
}
