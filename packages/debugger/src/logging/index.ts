export { DebugLogBuffer, type DebugLogBufferOptions } from './debug-log-buffer.js';
export { formatTimestamp } from './format-time.js';
