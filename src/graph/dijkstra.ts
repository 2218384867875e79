/**
 * dijkstra.ts — Minimum-cumulative-weight path search.
 *
 * Design:
 * - Frontier: a min-heap of frontier nodes ordered by cumulative weight from
 *   the start. Equal weights pop in insertion order (FIFO), which makes
 *   tie-breaking between equal-cost paths reproducible.
 * - Decrease-key: instead of re-ordering the heap, a cheaper route to a
 *   vertex inserts a new node and marks the superseded one stale; stale
 *   nodes are skipped when popped.
 * - Parent links between frontier nodes form a tree rooted at the start and
 *   live only for the duration of one call.
 *
 * Weights must be non-negative. This is not enforced: a negative weight can
 * produce a wrong result, never an exception or an endless loop. Every edge
 * out of a popped vertex is weighed, including edges into finalised
 * vertices, so `onNegativeWeight` sees each negative edge the search meets.
 */

import type { WeightFn } from './neighbor-source.js'
import { MinHeap } from './min-heap.js'
import { GraphPath } from './path.js'
import type { SearchContext } from './search-context.js'
import { isPresent } from './search-context.js'
import { VertexMap, VertexSet, sameVertex } from './vertex-keys.js'

interface FrontierNode<V> {
  readonly vertex: V
  readonly weightSumTo: number
  readonly parent: FrontierNode<V> | null
  /** Insertion counter, used to break ties between equal weights. */
  readonly sequence: number
  stale: boolean
}

function compareFrontierNodes<V>(a: FrontierNode<V>, b: FrontierNode<V>): number {
  return a.weightSumTo - b.weightSumTo || a.sequence - b.sequence
}

/**
 * Finds the path from `start` to `target` whose summed `weightFn` is
 * smallest.
 *
 * The result's `totalWeight` is that sum and its `visited` holds every
 * vertex whose cost was finalised. Returns null when start, target or
 * weightFn is absent, or when the target is unreachable.
 */
export function dijkstraShortestPath<V>(
  context: SearchContext<V>,
  start: V | null | undefined,
  target: V | null | undefined,
  weightFn: WeightFn<V> | null | undefined,
): GraphPath<V> | null {
  if (!isPresent(start) || !isPresent(target) || !isPresent(weightFn)) return null

  const { keyOf } = context
  const frontier = new MinHeap<FrontierNode<V>>(compareFrontierNodes)
  const best = new VertexMap<V, FrontierNode<V>>(keyOf)
  const visited = new VertexSet<V>(keyOf)
  let sequence = 0
  let negativeReported = false

  const insert = (vertex: V, parent: FrontierNode<V> | null, weightSumTo: number): void => {
    const node: FrontierNode<V> = { vertex, parent, weightSumTo, sequence: sequence++, stale: false }
    best.set(vertex, node)
    frontier.push(node)
  }

  insert(start, null, 0)

  for (let current = frontier.pop(); current !== undefined; current = frontier.pop()) {
    if (current.stale) continue

    visited.add(current.vertex)
    if (sameVertex(keyOf, current.vertex, target)) {
      return new GraphPath(
        walkBack(current),
        visited,
        current.weightSumTo,
        context.pathFormat,
      )
    }

    for (const neighbor of context.neighbors(current.vertex)) {
      const weight = weightFn(current.vertex, neighbor)
      if (weight < 0 && !negativeReported && context.onNegativeWeight !== undefined) {
        negativeReported = true
        context.onNegativeWeight(current.vertex, neighbor, weight)
      }
      // A finalised vertex never improves under non-negative weights.
      if (visited.has(neighbor)) continue

      const tentative = current.weightSumTo + weight
      const known = best.get(neighbor)
      if (known === undefined) {
        insert(neighbor, current, tentative)
      } else if (tentative < known.weightSumTo) {
        known.stale = true
        insert(neighbor, current, tentative)
      }
    }
  }

  return null
}

/** Vertices from the start node to `last`, following parent links. */
function walkBack<V>(last: FrontierNode<V>): V[] {
  const chain: V[] = []
  for (let node: FrontierNode<V> | null = last; node !== null; node = node.parent) {
    chain.push(node.vertex)
  }
  return chain.reverse()
}
