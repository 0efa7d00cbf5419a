export {
  ExecutionMode,
  BreakpointType,
  DebugLogLevel,
  COMPARISON_OPERATORS,
  ANY_STEP,
} from './debug.js';
export type { ComparisonOperator } from './debug.js';
