/**
 * reachability.ts — Every vertex reachable from a start vertex.
 *
 * Follows outgoing edges only. Each vertex is expanded at most once, so
 * cycles and self-loops terminate. Uses an explicit stack rather than
 * recursion, so deep graphs are bounded by heap, not call-stack, size.
 */

import type { SearchContext } from './search-context.js'
import { isPresent } from './search-context.js'
import { VertexSet } from './vertex-keys.js'

/**
 * Returns `start` plus every vertex transitively reachable from it.
 * Absent start → empty set.
 */
export function getAllVertices<V>(
  context: SearchContext<V>,
  start: V | null | undefined,
): VertexSet<V> {
  const reached = new VertexSet<V>(context.keyOf)
  if (!isPresent(start)) return reached

  const stack: V[] = [start]
  for (let vertex = stack.pop(); vertex !== undefined; vertex = stack.pop()) {
    if (!reached.add(vertex)) continue
    for (const neighbor of context.neighbors(vertex)) {
      if (!reached.has(neighbor)) stack.push(neighbor)
    }
  }

  return reached
}
