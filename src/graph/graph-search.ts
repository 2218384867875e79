/**
 * graph-search.ts — One object binding a graph to the search operations.
 *
 * `createGraphSearch` takes the neighbor lookup, the vertex identity and
 * label functions, and raw configuration (validated by `parseConfig`), and
 * returns the reachability, formatting and path-search operations with
 * those settings applied. Metric events are emitted per call when
 * `metrics.enabled` is set.
 */

import { parseConfig } from '../config.js'
import type { SearchConfig } from '../config.js'
import { createMetricEvent, emitMetric } from '../metrics/sink.js'
import type { SearchAlgorithm } from '../metrics/types.js'
import { formatAdjacencyList } from './adjacency-format.js'
import { breadthFirstSearch } from './breadth-first.js'
import { depthFirstSearch } from './depth-first.js'
import { dijkstraShortestPath } from './dijkstra.js'
import type { NeighborLookup, WeightFn } from './neighbor-source.js'
import type { GraphPath } from './path.js'
import { getAllVertices } from './reachability.js'
import { createSearchContext } from './search-context.js'
import type { SearchContext } from './search-context.js'
import type { KeyOf, VertexSet } from './vertex-keys.js'

export interface GraphSearchOptions<V> {
  /** Maps a vertex to its identity. Defaults to the vertex itself. */
  readonly keyOf?: KeyOf<V>
  /** Renders a vertex in paths and adjacency lists. Defaults to `String`. */
  readonly label?: (vertex: V) => string
  /** Raw configuration; validated and completed with defaults. */
  readonly config?: unknown
}

export interface GraphSearch<V> {
  readonly config: SearchConfig
  getAllVertices(start: V | null | undefined): VertexSet<V>
  formatAdjacencyList(start: V | null | undefined): string
  depthFirstSearch(start: V | null | undefined, target: V | null | undefined): GraphPath<V> | null
  breadthFirstSearch(start: V | null | undefined, target: V | null | undefined): GraphPath<V> | null
  dijkstraShortestPath(
    start: V | null | undefined,
    target: V | null | undefined,
    weightFn: WeightFn<V> | null | undefined,
  ): GraphPath<V> | null
}

/**
 * Creates a searcher over `lookup`.
 *
 * @throws {ConfigValidationError} when `options.config` is invalid.
 */
export function createGraphSearch<V>(
  lookup: NeighborLookup<V>,
  options: GraphSearchOptions<V> = {},
): GraphSearch<V> {
  const config = parseConfig(options.config, {
    onUnknownKeys: (keys) => console.warn(`[vsearch] config: ignoring unknown keys: ${keys.join(', ')}`),
  })

  const label = options.label ?? ((vertex: V) => String(vertex))
  const context: SearchContext<V> = createSearchContext(lookup, {
    ...(options.keyOf !== undefined ? { keyOf: options.keyOf } : {}),
    pathFormat: {
      displayCut: config.path.displayCut,
      weightDecimals: config.path.weightDecimals,
      label,
    },
    ...(config.weights.warnOnNegative
      ? {
          onNegativeWeight: (from: V, to: V, weight: number) =>
            console.warn(
              `[vsearch] dijkstra: negative edge weight ${weight} on ${label(from)} → ${label(to)}; ` +
              'shortest-path results are undefined for negative weights',
            ),
        }
      : {}),
  })

  const measured = (
    algorithm: SearchAlgorithm,
    run: () => GraphPath<V> | null,
  ): GraphPath<V> | null => {
    if (!config.metrics.enabled) return run()
    const startedAt = performance.now()
    const path = run()
    emitMetric(
      createMetricEvent({
        stage: 'search',
        algorithm,
        found: path !== null,
        pathLength: path?.length ?? 0,
        visitedCount: path?.visited.size ?? 0,
        totalWeight: path?.totalWeight ?? 0,
        durationMs: performance.now() - startedAt,
      }),
    )
    return path
  }

  return {
    config,

    getAllVertices(start) {
      if (!config.metrics.enabled) return getAllVertices(context, start)
      const startedAt = performance.now()
      const reached = getAllVertices(context, start)
      emitMetric(
        createMetricEvent({
          stage: 'reachability',
          vertexCount: reached.size,
          durationMs: performance.now() - startedAt,
        }),
      )
      return reached
    },

    formatAdjacencyList(start) {
      return formatAdjacencyList(context, start, { header: config.adjacency.header })
    },

    depthFirstSearch(start, target) {
      return measured('depth-first', () => depthFirstSearch(context, start, target))
    },

    breadthFirstSearch(start, target) {
      return measured('breadth-first', () => breadthFirstSearch(context, start, target))
    },

    dijkstraShortestPath(start, target, weightFn) {
      return measured('dijkstra', () => dijkstraShortestPath(context, start, target, weightFn))
    },
  }
}
