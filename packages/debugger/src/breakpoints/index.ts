export { Breakpoint, type BreakpointInit } from './breakpoint.js';
export { BreakpointRegistry, type ToggleResult } from './breakpoint-registry.js';
export { BreakpointValidationError } from './errors.js';
