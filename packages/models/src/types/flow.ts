/**
 * One step as the flow executor describes it: an action identifier plus
 * its parameters. Executors may attach further fields.
 */
export interface StepRecord {
  action_id?: string;
  params?: Record<string, unknown>;
  [key: string]: unknown;
}

/**
 * Completion message reported for a step. Structured messages carry their
 * human-readable text under `message`.
 */
export type StepMessage = string | Record<string, unknown>;

export interface VariableRecord {
  value: unknown;
  [key: string]: unknown;
}

/**
 * Read-only view of the flow's variables.
 */
export interface VariableStore {
  getVariable(name: string): unknown;
  getAllVariables(): Record<string, VariableRecord>;
}

/**
 * Hooks a flow executor awaits around every step.
 */
export interface FlowHooks {
  onStepStart(stepIndex: number, step: StepRecord): Promise<void>;
  onStepComplete(
    stepIndex: number,
    success: boolean,
    message: StepMessage,
  ): Promise<void>;
  onFlowComplete(success: boolean): void;
}

/**
 * Runs a flow's steps sequentially, awaiting each hook before moving on.
 */
export interface FlowExecutor {
  executeFlow(hooks: FlowHooks): Promise<void>;
  stopExecution(): void;
}
