import type { BreakpointType, ComparisonOperator } from '../enums/debug.js';

/**
 * Persisted form of a breakpoint. Field names follow the storage format
 * shared with existing project files, hence snake_case.
 */
export interface BreakpointDict {
  id: string;
  step_index: number;
  type: BreakpointType;
  condition: string;
  variable_name: string;
  /** Stringified comparison value, `null` when the breakpoint has none */
  variable_value: string | null;
  comparison_operator: ComparisonOperator;
  enabled: boolean;
  hit_count: number;
}
