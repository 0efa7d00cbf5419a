export { ContinueSignal } from './continue-signal.js';
export {
  ExecutionController,
  describeMessage,
  type ExecutionControllerOptions,
} from './execution-controller.js';
