export type {
  SearchAlgorithm,
  SearchMetrics,
  ReachabilityMetrics,
  MetricData,
  MetricEvent,
} from './types.js'
export { emitMetric, createMetricEvent } from './sink.js'
