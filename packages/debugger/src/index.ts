export * from './breakpoints/index.js';
export * from './conditions/index.js';
export * from './control/index.js';
export * from './logging/index.js';
export * from './metrics/index.js';
export * from './runner/index.js';
export * from './types/index.js';
export * from './variables/index.js';
export { resolveDebuggerConfig } from './config.js';
