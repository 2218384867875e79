export { parseConfig, searchConfigSchema, ConfigValidationError } from './config.js'
export type { SearchConfig, SearchConfigInput, ParseConfigOptions } from './config.js'

export { createGraphSearch } from './graph/graph-search.js'
export type { GraphSearch, GraphSearchOptions } from './graph/graph-search.js'

export { createSearchContext, isPresent } from './graph/search-context.js'
export type { SearchContext, SearchContextOptions } from './graph/search-context.js'

export {
  toNeighborFn,
  fromAdjacency,
  fromWeightedEdges,
  weightsFromEdges,
  MissingEdgeWeightError,
} from './graph/neighbor-source.js'
export type {
  NeighborSource,
  NeighborFn,
  NeighborLookup,
  WeightFn,
  WeightedEdge,
  EdgeListOptions,
} from './graph/neighbor-source.js'

export { VertexSet, VertexMap, identityKey, sameVertex } from './graph/vertex-keys.js'
export type { KeyOf, ReadonlyVertexSet } from './graph/vertex-keys.js'

export { GraphPath, DEFAULT_PATH_FORMAT } from './graph/path.js'
export type { PathFormat } from './graph/path.js'

export { getAllVertices } from './graph/reachability.js'
export { formatAdjacencyList } from './graph/adjacency-format.js'
export type { AdjacencyFormatOptions } from './graph/adjacency-format.js'
export { depthFirstSearch } from './graph/depth-first.js'
export { breadthFirstSearch } from './graph/breadth-first.js'
export { dijkstraShortestPath } from './graph/dijkstra.js'

export { emitMetric, createMetricEvent } from './metrics/index.js'
export type {
  SearchAlgorithm,
  SearchMetrics,
  ReachabilityMetrics,
  MetricData,
  MetricEvent,
} from './metrics/index.js'
