export { DebugFlowRunner } from './debug-flow-runner.js';
export type { FlowRunnerEvents } from './events.js';
