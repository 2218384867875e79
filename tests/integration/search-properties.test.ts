/**
 * Cross-checks the three searches against exhaustive path enumeration on
 * small seeded random graphs.
 */

import { describe, it, expect } from 'vitest'
import { createGraphSearch } from '../../src/graph/graph-search.js'
import { fromWeightedEdges, toNeighborFn, weightsFromEdges } from '../../src/graph/neighbor-source.js'
import {
  cellKey,
  enumerateSimplePaths,
  gridNeighbors,
  isWalk,
  mulberry32,
  pathWeight,
  randomWeightedEdges,
} from '../helpers/graphs.js'
import type { Cell } from '../helpers/graphs.js'

const VERTEX_COUNT = 7
const SEEDS = [1, 2, 3, 5, 8, 13, 21, 34]

describe.each(SEEDS)('random graph (seed %i)', (seed) => {
  const edges = randomWeightedEdges(mulberry32(seed), VERTEX_COUNT, 0.3)
  const source = fromWeightedEdges(edges)
  const neighbors = toNeighborFn(source)
  const weightFn = weightsFromEdges(edges)
  const search = createGraphSearch(source)
  const vertices = Array.from({ length: VERTEX_COUNT }, (_, i) => `v${i}`)
  const pairs = vertices.flatMap((start) => vertices.map((target) => [start, target] as const))

  it('all searches agree with exhaustive enumeration', () => {
    for (const [start, target] of pairs) {
      const all = enumerateSimplePaths(neighbors, start, target)
      const dfs = search.depthFirstSearch(start, target)
      const bfs = search.breadthFirstSearch(start, target)
      const dijkstra = search.dijkstraShortestPath(start, target, weightFn)

      if (all.length === 0) {
        expect(dfs).toBeNull()
        expect(bfs).toBeNull()
        expect(dijkstra).toBeNull()
        continue
      }

      const minHops = Math.min(...all.map((p) => p.length))
      const minWeight = Math.min(...all.map((p) => pathWeight(p, weightFn)))

      for (const path of [dfs, bfs, dijkstra]) {
        expect(path).not.toBeNull()
        if (!path) continue
        expect(path.start).toBe(start)
        expect(path.target).toBe(target)
        expect(isWalk(neighbors, path.vertices)).toBe(true)
        expect(path.visited.containsAll(path.vertices)).toBe(true)
      }

      expect(bfs?.length).toBe(minHops)
      expect(dijkstra?.totalWeight).toBe(minWeight)
      expect(dijkstra?.recalculateTotalWeight(weightFn)).toBe(minWeight)
    }
  })

  it('start equals target → one-vertex path for every search', () => {
    for (const vertex of vertices) {
      expect(search.depthFirstSearch(vertex, vertex)?.vertices).toEqual([vertex])
      expect(search.breadthFirstSearch(vertex, vertex)?.vertices).toEqual([vertex])
      expect(search.dijkstraShortestPath(vertex, vertex, weightFn)?.totalWeight).toBe(0)
    }
  })

  it('reachability matches the set of vertices with a path', () => {
    for (const start of vertices) {
      const reachable = vertices.filter((target) => enumerateSimplePaths(neighbors, start, target).length > 0)
      expect(search.getAllVertices(start).toArray().sort()).toEqual(reachable.sort())
    }
  })
})

describe('grid graphs', () => {
  it('breadth-first length is Manhattan distance plus one for every pair', () => {
    const rows = 4
    const cols = 5
    const search = createGraphSearch<Cell>(gridNeighbors(rows, cols), { keyOf: cellKey })
    const cells: Cell[] = []
    for (let row = 0; row < rows; row++) {
      for (let col = 0; col < cols; col++) cells.push({ row, col })
    }

    for (const start of cells) {
      for (const target of cells) {
        const expected = Math.abs(start.row - target.row) + Math.abs(start.col - target.col) + 1
        expect(search.breadthFirstSearch(start, target)?.length).toBe(expected)
      }
    }
  })

  it('unit-weight dijkstra agrees with breadth-first on hop count', () => {
    const search = createGraphSearch<Cell>(gridNeighbors(6, 6), { keyOf: cellKey })
    const path = search.dijkstraShortestPath({ row: 0, col: 0 }, { row: 5, col: 3 }, () => 1)
    expect(path?.totalWeight).toBe(8)
    expect(path?.length).toBe(9)
  })
})
