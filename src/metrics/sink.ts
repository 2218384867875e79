/**
 * Metric emission sink: one structured console line per event.
 */

import type { MetricData, MetricEvent } from './types.js'

/**
 * Emits a metric event to stderr via console.warn.
 * Runs regardless of config; callers decide whether to call it.
 */
export function emitMetric(event: MetricEvent): void {
  console.warn(`[vsearch:metrics] ${JSON.stringify(event)}`)
}

/** Wraps a payload in a `MetricEvent` stamped with the current time. */
export function createMetricEvent(data: MetricData, now: Date = new Date()): MetricEvent {
  return {
    stage: data.stage,
    timestamp: now.toISOString(),
    data,
  }
}
