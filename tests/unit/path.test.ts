import { describe, it, expect, expectTypeOf } from 'vitest'
import { GraphPath } from '../../src/graph/path.js'
import { VertexSet, identityKey } from '../../src/graph/vertex-keys.js'
import type { ReadonlyVertexSet } from '../../src/graph/vertex-keys.js'

const EDGE_WEIGHTS: Readonly<Record<string, number>> = { AB: 2, BC: 3.5, CD: 1 }
const weightOf = (from: string, to: string): number => EDGE_WEIGHTS[from + to] ?? Number.NaN

function visitedOf(...vertices: string[]): VertexSet<string> {
  return new VertexSet(identityKey, vertices)
}

describe('GraphPath — accessors', () => {
  it('empty path has no start or target', () => {
    const path = new GraphPath<string>([], visitedOf())
    expect(path.isEmpty).toBe(true)
    expect(path.length).toBe(0)
    expect(path.start).toBeUndefined()
    expect(path.target).toBeUndefined()
  })

  it('one-vertex path has the same start and target', () => {
    const path = new GraphPath(['A'], visitedOf('A'))
    expect(path.start).toBe('A')
    expect(path.target).toBe('A')
    expect(path.totalWeight).toBe(0)
  })

  it('copies the vertices it is given', () => {
    const source = ['A', 'B']
    const path = new GraphPath(source, visitedOf('A', 'B'))
    source.push('C')
    expect(path.vertices).toEqual(['A', 'B'])
  })

  it('keeps its own copy of the visited set', () => {
    const visited = visitedOf('A', 'B')
    const path = new GraphPath(['A', 'B'], visited)
    visited.add('Z')
    expect(path.visited.toArray()).toEqual(['A', 'B'])
    expect(path.visited.has('Z')).toBe(false)
  })

  it('exposes visited for queries only', () => {
    const path = new GraphPath(['A'], visitedOf('A'))
    expectTypeOf(path.visited).toEqualTypeOf<ReadonlyVertexSet<string>>()
    expectTypeOf(path.visited).not.toHaveProperty('add')
  })
})

describe('GraphPath — recalculateTotalWeight', () => {
  it('sums weights over consecutive pairs', () => {
    const path = new GraphPath(['A', 'B', 'C'], visitedOf('A', 'B', 'C'))
    expect(path.recalculateTotalWeight(weightOf)).toBe(5.5)
    expect(path.totalWeight).toBe(5.5)
  })

  it('the first vertex contributes nothing', () => {
    const path = new GraphPath(['A'], visitedOf('A'), 7)
    expect(path.recalculateTotalWeight(weightOf)).toBe(0)
    expect(path.totalWeight).toBe(0)
  })

  it('replaces a previous total', () => {
    const path = new GraphPath(['B', 'C', 'D'], visitedOf('B', 'C', 'D'), 100)
    path.recalculateTotalWeight(weightOf)
    expect(path.totalWeight).toBe(4.5)
  })
})

describe('GraphPath — toString', () => {
  it('prints weight, length, visited count and vertices', () => {
    const path = new GraphPath(['A', 'B', 'C'], visitedOf('A', 'B', 'C', 'D'), 2)
    expect(path.toString()).toBe('Weight=2.00 Length=3 visited=4 (A, B, C)')
  })

  it('prints every vertex of a path of exactly twice the display cut', () => {
    const vertices = Array.from({ length: 20 }, (_, i) => `v${i}`)
    const path = new GraphPath(vertices, visitedOf(...vertices))
    expect(path.toString()).toBe(`Weight=0.00 Length=20 visited=20 (${vertices.join(', ')})`)
  })

  it('elides the middle of a long path', () => {
    const vertices = Array.from({ length: 25 }, (_, i) => `v${i}`)
    const path = new GraphPath(vertices, visitedOf(...vertices))
    const shown = [...vertices.slice(0, 10), '...', ...vertices.slice(15)].join(', ')
    expect(path.toString()).toBe(`Weight=0.00 Length=25 visited=25 (${shown})`)
  })

  it('honours a custom format', () => {
    const path = new GraphPath(['A', 'B', 'C', 'D'], visitedOf(), 1.6, {
      displayCut: 1,
      weightDecimals: 0,
      label: (v) => v.toLowerCase(),
    })
    expect(path.toString()).toBe('Weight=2 Length=4 visited=0 (a, ..., d)')
  })
})
