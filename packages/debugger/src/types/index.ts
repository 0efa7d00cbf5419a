export type {
  BreakpointHitData,
  BreakpointHitHandler,
  StepExecutionHandler,
  VariableChangedHandler,
  ExecutionPausedHandler,
  ExecutionResumedHandler,
  DebugLogHandler,
  DebugObservers,
} from './observers.js';
