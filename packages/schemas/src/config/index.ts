export { BreakpointDictSchema } from './BreakpointDictSchema.js';
export { DebuggerConfigSchema } from './DebuggerConfigSchema.js';
