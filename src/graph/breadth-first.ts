/**
 * breadth-first.ts — Level-order path search returning a minimum-hop path.
 *
 * The target is recognised as a neighbor of the vertex being expanded, before
 * any vertex further from the start is expanded, so the first match is at
 * minimum distance.
 */

import { GraphPath } from './path.js'
import type { SearchContext } from './search-context.js'
import { isPresent } from './search-context.js'
import { VertexMap, VertexSet, sameVertex } from './vertex-keys.js'

/**
 * Finds a path from `start` to `target` with the fewest edges.
 *
 * `visited` on the result holds every vertex taken off the queue plus the
 * target. Returns null when either vertex is absent or the target is
 * unreachable.
 */
export function breadthFirstSearch<V>(
  context: SearchContext<V>,
  start: V | null | undefined,
  target: V | null | undefined,
): GraphPath<V> | null {
  if (!isPresent(start) || !isPresent(target)) return null

  const { keyOf } = context
  const visited = new VertexSet<V>(keyOf)

  if (sameVertex(keyOf, start, target)) {
    visited.add(start)
    return new GraphPath([start], visited, 0, context.pathFormat)
  }

  // Parent of each discovered vertex; the start maps to null.
  const discoveredFrom = new VertexMap<V, V | null>(keyOf)
  discoveredFrom.set(start, null)

  const queue: V[] = [start]
  let head = 0

  while (head < queue.length) {
    const current = queue[head++]
    if (current === undefined) break
    visited.add(current)

    for (const neighbor of context.neighbors(current)) {
      if (sameVertex(keyOf, neighbor, target)) {
        visited.add(neighbor)
        return new GraphPath(
          [...walkBack(discoveredFrom, current), neighbor],
          visited,
          0,
          context.pathFormat,
        )
      }
      if (!discoveredFrom.has(neighbor)) {
        discoveredFrom.set(neighbor, current)
        queue.push(neighbor)
      }
    }
  }

  return null
}

/** Vertices from the start to `last`, following recorded parents. */
function walkBack<V>(discoveredFrom: VertexMap<V, V | null>, last: V): V[] {
  const chain: V[] = []
  let vertex: V | null | undefined = last
  while (isPresent(vertex)) {
    chain.push(vertex)
    vertex = discoveredFrom.get(vertex)
  }
  return chain.reverse()
}
