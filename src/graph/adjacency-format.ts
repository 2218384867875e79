/**
 * adjacency-format.ts — Human-readable adjacency list of the subgraph
 * reachable from a start vertex.
 *
 * Output (one line per vertex, in pre-order of a spanning tree rooted at the
 * start vertex, following outgoing edges only):
 *
 *   Graph adjacency list:
 *   A: [B, C]
 *   B: [D]
 *   D: []
 *   C: [D]
 */

import type { SearchContext } from './search-context.js'
import { isPresent } from './search-context.js'
import { VertexSet } from './vertex-keys.js'

export interface AdjacencyFormatOptions {
  /** First line of the output; omitted when empty. */
  readonly header: string
}

interface Frame<V> {
  readonly pending: Iterator<V>
}

export function formatAdjacencyList<V>(
  context: SearchContext<V>,
  start: V | null | undefined,
  options: AdjacencyFormatOptions = { header: 'Graph adjacency list:' },
): string {
  const lines: string[] = options.header === '' ? [] : [options.header]
  if (!isPresent(start)) return lines.map((line) => `${line}\n`).join('')

  const { label } = context.pathFormat
  const seen = new VertexSet<V>(context.keyOf)
  const stack: Frame<V>[] = []

  const enter = (vertex: V): void => {
    seen.add(vertex)
    const neighbors = [...context.neighbors(vertex)]
    lines.push(`${label(vertex)}: [${neighbors.map(label).join(', ')}]`)
    stack.push({ pending: neighbors[Symbol.iterator]() })
  }

  enter(start)
  while (stack.length > 0) {
    const frame = stack[stack.length - 1]
    if (frame === undefined) break
    const next = frame.pending.next()
    if (next.done === true) {
      stack.pop()
    } else if (!seen.has(next.value)) {
      enter(next.value)
    }
  }

  return lines.map((line) => `${line}\n`).join('')
}
