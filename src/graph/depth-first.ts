/**
 * depth-first.ts — Backtracking depth-first path search.
 *
 * Explores neighbors in the order the neighbor source yields them and returns
 * the first path that reaches the target. Not shortest by any metric.
 *
 * The exploration runs on an explicit stack of (vertex, remaining neighbors)
 * frames and visits vertices in exactly the order a recursive backtracking
 * search would, without the recursion-depth limit.
 */

import { GraphPath } from './path.js'
import type { SearchContext } from './search-context.js'
import { isPresent } from './search-context.js'
import { VertexSet, sameVertex } from './vertex-keys.js'

interface Frame<V> {
  readonly vertex: V
  readonly pending: Iterator<V>
}

/**
 * Finds a path from `start` to `target` by depth-first backtracking.
 *
 * The result's `visited` holds every vertex entered before the target was
 * reached, including those on abandoned branches. Returns null when either
 * vertex is absent or the target is unreachable.
 */
export function depthFirstSearch<V>(
  context: SearchContext<V>,
  start: V | null | undefined,
  target: V | null | undefined,
): GraphPath<V> | null {
  if (!isPresent(start) || !isPresent(target)) return null

  const { keyOf } = context
  const visited = new VertexSet<V>(keyOf)
  const trail: V[] = []
  const stack: Frame<V>[] = []

  /** Enters `vertex`; returns true when it is the target. */
  const enter = (vertex: V): boolean => {
    visited.add(vertex)
    trail.push(vertex)
    if (sameVertex(keyOf, vertex, target)) return true
    stack.push({ vertex, pending: context.neighbors(vertex)[Symbol.iterator]() })
    return false
  }

  if (enter(start)) {
    return new GraphPath(trail, visited, 0, context.pathFormat)
  }

  while (stack.length > 0) {
    const frame = stack[stack.length - 1]
    if (frame === undefined) break
    const next = frame.pending.next()

    if (next.done === true) {
      // Every neighbor failed: backtrack.
      stack.pop()
      trail.pop()
      continue
    }

    if (visited.has(next.value)) continue
    if (enter(next.value)) {
      return new GraphPath(trail, visited, 0, context.pathFormat)
    }
  }

  return null
}
