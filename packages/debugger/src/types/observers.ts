import type { DebugLogEntry, StepRecord } from '@flowscope/models';

/**
 * What a breakpoint hit reports alongside its id: the step record for
 * LINE and CONDITION hits, `{ errorMessage }` for ERROR hits and
 * `{ variableName, variableValue }` for VARIABLE hits.
 */
export type BreakpointHitData = StepRecord;

export type BreakpointHitHandler = (
  breakpointId: string,
  stepIndex: number,
  data: BreakpointHitData,
) => void;
export type StepExecutionHandler = (stepIndex: number, step: StepRecord) => void;
export type VariableChangedHandler = (name: string, value: unknown) => void;
export type ExecutionPausedHandler = (stepIndex: number) => void;
export type ExecutionResumedHandler = (stepIndex: number) => void;
export type DebugLogHandler = (entry: DebugLogEntry) => void;

/**
 * One handler per event kind; registering a new one replaces the old.
 */
export interface DebugObservers {
  breakpointHit?: BreakpointHitHandler;
  stepExecution?: StepExecutionHandler;
  variableChanged?: VariableChangedHandler;
  executionPaused?: ExecutionPausedHandler;
  executionResumed?: ExecutionResumedHandler;
  debugLog?: DebugLogHandler;
}
