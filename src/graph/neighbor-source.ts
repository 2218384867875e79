/**
 * neighbor-source.ts — The one capability the search engine asks of a graph.
 *
 * A concrete graph (maze, road map, state machine) satisfies the contract by
 * reporting the vertices directly reachable from a given vertex. Directed
 * graphs report outgoing neighbors only; undirected graphs report both
 * directions. A vertex is its own neighbor only through a real self-loop.
 *
 * The adapters below cover the common case of a graph that is already held
 * as an adjacency map or an edge list.
 */

import { VertexMap, identityKey } from './vertex-keys.js'
import type { KeyOf } from './vertex-keys.js'

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

/** Object form of the neighbor-lookup capability. */
export interface NeighborSource<V> {
  neighbors(vertex: V): Iterable<V>
}

/** Function form of the neighbor-lookup capability. */
export type NeighborFn<V> = (vertex: V) => Iterable<V>

/** Either form; searches accept both. */
export type NeighborLookup<V> = NeighborSource<V> | NeighborFn<V>

/**
 * Cost of the edge `from → to`. Only needs to be defined for pairs that are
 * edges of the graph.
 */
export type WeightFn<V> = (from: V, to: V) => number

/** Normalises either form of the capability to a plain function. */
export function toNeighborFn<V>(lookup: NeighborLookup<V>): NeighborFn<V> {
  if (typeof lookup === 'function') return lookup
  return (vertex) => lookup.neighbors(vertex)
}

// ---------------------------------------------------------------------------
// Adjacency adapter
// ---------------------------------------------------------------------------

const NO_NEIGHBORS: readonly never[] = []

function isAdjacencyMap<V>(
  adjacency: ReadonlyMap<V, Iterable<V>> | Readonly<Record<string, readonly string[]>>,
): adjacency is ReadonlyMap<V, Iterable<V>> {
  return adjacency instanceof Map
}

/**
 * Builds a neighbor source over an adjacency map or a string-keyed record.
 * Vertices missing from the adjacency have no neighbors.
 */
export function fromAdjacency<V>(adjacency: ReadonlyMap<V, Iterable<V>>): NeighborSource<V>
export function fromAdjacency(adjacency: Readonly<Record<string, readonly string[]>>): NeighborSource<string>
export function fromAdjacency<V>(
  adjacency: ReadonlyMap<V, Iterable<V>> | Readonly<Record<string, readonly string[]>>,
): NeighborSource<V> | NeighborSource<string> {
  if (isAdjacencyMap(adjacency)) {
    return { neighbors: (vertex: V) => adjacency.get(vertex) ?? NO_NEIGHBORS }
  }
  const record = adjacency
  return {
    neighbors: (vertex: string) =>
      Object.prototype.hasOwnProperty.call(record, vertex) ? (record[vertex] ?? NO_NEIGHBORS) : NO_NEIGHBORS,
  }
}

// ---------------------------------------------------------------------------
// Weighted edge-list adapters
// ---------------------------------------------------------------------------

/** A weighted edge. Undirected graphs list each edge once. */
export interface WeightedEdge<V> {
  readonly from: V
  readonly to: V
  readonly weight: number
}

export interface EdgeListOptions<V> {
  /** When false each edge is usable in both directions. @default true */
  readonly directed?: boolean
  readonly keyOf?: KeyOf<V>
}

/** Thrown by a weight function built from an edge list for a non-edge pair. */
export class MissingEdgeWeightError extends Error {
  constructor(
    readonly from: unknown,
    readonly to: unknown,
  ) {
    super(`No edge from ${String(from)} to ${String(to)}`)
    this.name = 'MissingEdgeWeightError'
  }
}

interface EdgeIndex<V> {
  readonly outgoing: VertexMap<V, V[]>
  readonly weights: VertexMap<V, VertexMap<V, number>>
}

function indexEdges<V>(edges: Iterable<WeightedEdge<V>>, options: EdgeListOptions<V>): EdgeIndex<V> {
  const keyOf = options.keyOf ?? identityKey
  const directed = options.directed ?? true
  const outgoing = new VertexMap<V, V[]>(keyOf)
  const weights = new VertexMap<V, VertexMap<V, number>>(keyOf)

  const link = (from: V, to: V, weight: number): void => {
    let row = weights.get(from)
    if (row === undefined) {
      row = new VertexMap<V, number>(keyOf)
      weights.set(from, row)
    }
    let targets = outgoing.get(from)
    if (targets === undefined) {
      targets = []
      outgoing.set(from, targets)
    }
    // Parallel edges collapse to one; the later weight wins.
    if (!row.has(to)) targets.push(to)
    row.set(to, weight)
  }

  for (const edge of edges) {
    link(edge.from, edge.to, edge.weight)
    if (!directed) link(edge.to, edge.from, edge.weight)
  }

  return { outgoing, weights }
}

/** Builds a neighbor source from a weighted edge list. */
export function fromWeightedEdges<V>(
  edges: Iterable<WeightedEdge<V>>,
  options: EdgeListOptions<V> = {},
): NeighborSource<V> {
  const { outgoing } = indexEdges(edges, options)
  return { neighbors: (vertex) => outgoing.get(vertex) ?? NO_NEIGHBORS }
}

/**
 * Builds the weight function matching {@link fromWeightedEdges}.
 *
 * @throws {MissingEdgeWeightError} when called for a pair that is not an edge.
 */
export function weightsFromEdges<V>(
  edges: Iterable<WeightedEdge<V>>,
  options: EdgeListOptions<V> = {},
): WeightFn<V> {
  const { weights } = indexEdges(edges, options)
  return (from, to) => {
    const weight = weights.get(from)?.get(to)
    if (weight === undefined) throw new MissingEdgeWeightError(from, to)
    return weight
  }
}
