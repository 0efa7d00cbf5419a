import type {
  FlowExecutor,
  FlowHooks,
  StepMessage,
  StepRecord,
} from '@flowscope/models';

export interface ScriptedStep {
  step: StepRecord;
  /** Runs between the two step hooks; defaults to a successful step */
  run?: () => { success: boolean; message: StepMessage };
}

/**
 * Sequential executor over a fixed list of steps. A failed step ends the
 * flow unsuccessfully.
 */
export class ScriptedFlowExecutor implements FlowExecutor {
  public readonly executed: number[] = [];
  private stopped = false;

  public constructor(private readonly steps: ScriptedStep[]) {}

  public static ofLength(count: number): ScriptedFlowExecutor {
    return new ScriptedFlowExecutor(
      Array.from({ length: count }, (_, index) => ({
        step: { action_id: `action_${index}`, params: {} },
      })),
    );
  }

  public async executeFlow(hooks: FlowHooks): Promise<void> {
    this.stopped = false;
    let success = true;

    for (const [index, { step, run }] of this.steps.entries()) {
      if (this.stopped) {
        success = false;
        break;
      }
      await hooks.onStepStart(index, step);
      if (this.stopped) {
        success = false;
        break;
      }

      const outcome = run ? run() : { success: true, message: 'ok' };
      this.executed.push(index);
      await hooks.onStepComplete(index, outcome.success, outcome.message);
      if (!outcome.success) {
        success = false;
        break;
      }
    }

    hooks.onFlowComplete(success);
  }

  public stopExecution(): void {
    this.stopped = true;
  }
}

/**
 * Executor whose flow rejects before running any step.
 */
export class BrokenFlowExecutor implements FlowExecutor {
  public async executeFlow(): Promise<void> {
    throw new Error('executor crashed');
  }

  public stopExecution(): void {}
}
