export {
  PerformanceMetrics,
  type PerformanceMetricsOptions,
} from './performance-metrics.js';
export {
  NodeProcessSampler,
  type ProcessSample,
  type ProcessSampler,
} from './process-sampler.js';
