import type { z } from 'zod';
import type {
  BreakpointDictSchema,
  DebuggerConfigSchema,
} from './config/index.js';

export * from './config/index.js';

export type BreakpointDictInput = z.input<typeof BreakpointDictSchema>;
export type ParsedBreakpointDict = z.output<typeof BreakpointDictSchema>;
export type DebuggerConfig = z.output<typeof DebuggerConfigSchema>;
export type DebuggerConfigInput = z.input<typeof DebuggerConfigSchema>;
