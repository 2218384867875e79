/**
 * search-context.ts — What every search needs besides its start and target:
 * the neighbor lookup, vertex identity, and how result paths render.
 *
 * Each search call builds its own visited/parent/frontier bookkeeping, so one
 * context can be shared by any number of calls.
 */

import { toNeighborFn } from './neighbor-source.js'
import type { NeighborFn, NeighborLookup } from './neighbor-source.js'
import { DEFAULT_PATH_FORMAT } from './path.js'
import type { PathFormat } from './path.js'
import { identityKey } from './vertex-keys.js'
import type { KeyOf } from './vertex-keys.js'

export interface SearchContext<V> {
  readonly neighbors: NeighborFn<V>
  readonly keyOf: KeyOf<V>
  readonly pathFormat: PathFormat<V>
  /**
   * Called by the weighted search the first time it sees a negative edge
   * weight. Purely diagnostic; the search carries on unchanged.
   */
  readonly onNegativeWeight?: (from: V, to: V, weight: number) => void
}

export interface SearchContextOptions<V> {
  readonly keyOf?: KeyOf<V>
  readonly pathFormat?: Partial<PathFormat<V>>
  readonly onNegativeWeight?: (from: V, to: V, weight: number) => void
}

export function createSearchContext<V>(
  lookup: NeighborLookup<V>,
  options: SearchContextOptions<V> = {},
): SearchContext<V> {
  return {
    neighbors: toNeighborFn(lookup),
    keyOf: options.keyOf ?? identityKey,
    pathFormat: { ...DEFAULT_PATH_FORMAT, ...options.pathFormat },
    ...(options.onNegativeWeight !== undefined ? { onNegativeWeight: options.onNegativeWeight } : {}),
  }
}

/** Absent vertices (null or undefined) make every search return not-found. */
export function isPresent<V>(vertex: V | null | undefined): vertex is V {
  return vertex !== null && vertex !== undefined
}
