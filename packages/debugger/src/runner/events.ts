import type {
  DebugLogEntry,
  PerformanceMetricsDict,
  StepRecord,
} from '@flowscope/models';
import type { BreakpointHitData } from '../types/index.js';

// Events re-published by DebugFlowRunner
export interface FlowRunnerEvents {
  stepStarted: { stepIndex: number; step: StepRecord };
  stepCompleted: { stepIndex: number; success: boolean; message: string };
  flowCompleted: { success: boolean };
  breakpointHit: {
    breakpointId: string;
    stepIndex: number;
    data: BreakpointHitData;
  };
  executionPaused: { stepIndex: number };
  executionResumed: { stepIndex: number };
  variableChanged: { name: string; value: unknown };
  metricsUpdated: PerformanceMetricsDict;
  debugLogAdded: DebugLogEntry;
}
