/**
 * How the execution controller paces a running flow.
 */
export enum ExecutionMode {
  /** Free-running, never pauses */
  Normal = 'normal',
  /** Pauses only when a breakpoint matches */
  Debug = 'debug',
  /** Pauses before every step */
  Step = 'step',
}

/**
 * Breakpoint kinds. Values are the persisted `type` field.
 */
export enum BreakpointType {
  Line = 'line',
  Condition = 'condition',
  Error = 'error',
  Variable = 'variable',
}

/**
 * Debug log levels. Values appear verbatim in exported logs.
 */
export enum DebugLogLevel {
  Debug = 'DEBUG',
  Info = 'INFO',
  Warning = 'WARNING',
  Error = 'ERROR',
  Success = 'SUCCESS',
}

/**
 * Operators accepted by VARIABLE breakpoints and condition comparisons.
 */
export const COMPARISON_OPERATORS = [
  '==',
  '!=',
  '>',
  '<',
  '>=',
  '<=',
  'in',
  'not in',
] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

/**
 * Step index wildcard for breakpoints that are not tied to one step
 * (ERROR and VARIABLE breakpoints).
 */
export const ANY_STEP = -1;
