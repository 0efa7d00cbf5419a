export type { BreakpointDict } from './breakpoint.js';
export type { DebugLogEntry, ExportResult } from './debug-log.js';
export type {
  StepTiming,
  MemorySample,
  CpuSample,
  AverageMemoryUsage,
  PerformanceMetricsDict,
} from './metrics.js';
export type {
  StepRecord,
  StepMessage,
  VariableRecord,
  VariableStore,
  FlowHooks,
  FlowExecutor,
} from './flow.js';
