import { describe, it, expect, vi, afterEach } from 'vitest'
import { emitMetric, createMetricEvent } from '../../../src/metrics/sink.js'
import type { MetricEvent } from '../../../src/metrics/types.js'

function makeSearchEvent(): MetricEvent {
  return {
    stage: 'search',
    timestamp: '2026-01-01T00:00:00.000Z',
    data: {
      stage: 'search',
      algorithm: 'breadth-first',
      found: true,
      pathLength: 3,
      visitedCount: 4,
      totalWeight: 0,
      durationMs: 0.5,
    },
  }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('emitMetric', () => {
  it('writes one prefixed JSON line to console.warn', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const event = makeSearchEvent()

    emitMetric(event)

    expect(warnSpy).toHaveBeenCalledTimes(1)
    expect(warnSpy).toHaveBeenCalledWith(`[vsearch:metrics] ${JSON.stringify(event)}`)
  })
})

describe('createMetricEvent', () => {
  it('stamps the payload with the given time and copies its stage', () => {
    const data = { stage: 'reachability', vertexCount: 7, durationMs: 1 } as const
    const event = createMetricEvent(data, new Date('2026-01-01T00:00:00Z'))

    expect(event).toEqual({
      stage: 'reachability',
      timestamp: '2026-01-01T00:00:00.000Z',
      data,
    })
  })

  it('defaults to the current time', () => {
    const before = Date.now()
    const event = createMetricEvent(makeSearchEvent().data)
    const stamped = Date.parse(event.timestamp)

    expect(stamped).toBeGreaterThanOrEqual(before - 1)
    expect(stamped).toBeLessThanOrEqual(Date.now())
  })
})
