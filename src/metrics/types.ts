/**
 * Structured metric types emitted by the searcher.
 * All types are immutable and serializable to JSON.
 */

/** Name of the algorithm that produced a search metric. */
export type SearchAlgorithm = 'depth-first' | 'breadth-first' | 'dijkstra'

/** Emitted once per path search. */
export interface SearchMetrics {
  readonly stage: 'search'
  readonly algorithm: SearchAlgorithm
  readonly found: boolean
  /** Vertices on the returned path; 0 when nothing was found. */
  readonly pathLength: number
  /** Vertices the search inspected; 0 when nothing was found. */
  readonly visitedCount: number
  readonly totalWeight: number
  readonly durationMs: number
}

/** Emitted once per reachability collection. */
export interface ReachabilityMetrics {
  readonly stage: 'reachability'
  readonly vertexCount: number
  readonly durationMs: number
}

/** Union of all metric payload types. */
export type MetricData = SearchMetrics | ReachabilityMetrics

/** A timestamped metric event carrying one of the metric payloads. */
export interface MetricEvent {
  readonly stage: MetricData['stage']
  readonly timestamp: string
  readonly data: MetricData
}
