import Emittery from 'emittery';
import {
  ExecutionMode,
  type FlowExecutor,
  type FlowHooks,
  type StepMessage,
  type StepRecord,
} from '@flowscope/models';
import { createScopedLogger, type ILogger } from '@flowscope/core';
import { Breakpoint } from '../breakpoints/breakpoint.js';
import {
  ExecutionController,
  describeMessage,
} from '../control/execution-controller.js';
import type { FlowRunnerEvents } from './events.js';

/**
 * Drives a {@link FlowExecutor} under an {@link ExecutionController} and
 * re-publishes everything that happens on a typed event bus.
 *
 * The runner claims every observer slot of its controller; subscribe to
 * the runner's events instead of registering controller observers.
 *
 * @example
 * ```typescript
 * const runner = new DebugFlowRunner(executor, new ExecutionController());
 * runner.on('executionPaused', ({ stepIndex }) => {
 *   console.log(`Paused before step ${stepIndex}`);
 *   runner.stepOver();
 * });
 * await runner.run(ExecutionMode.Step);
 * ```
 * @public
 */
export class DebugFlowRunner extends Emittery<FlowRunnerEvents> {
  private readonly executor: FlowExecutor;
  private readonly controller: ExecutionController;
  private readonly logger: ILogger;
  private readonly temporaryBreakpoints = new Set<string>();
  private running = false;

  public constructor(
    executor: FlowExecutor,
    controller: ExecutionController,
    logger: ILogger = createScopedLogger('debugger:runner'),
  ) {
    super();
    this.executor = executor;
    this.controller = controller;
    this.logger = logger;
    this.attachControllerObservers();
  }

  /**
   * Runs the flow to completion under the given mode.
   * @returns false when the executor failed or a run was already in progress
   * @public
   */
  public async run(mode: ExecutionMode = ExecutionMode.Debug): Promise<boolean> {
    if (this.running) {
      this.logger.warn('Flow run requested while another run is in progress');
      return false;
    }

    this.running = true;
    this.controller.startDebugging(mode);
    try {
      await this.executor.executeFlow(this.createHooks());
      return true;
    } catch (error) {
      this.logger.error('Flow execution failed', error);
      this.publish('flowCompleted', { success: false });
      return false;
    } finally {
      this.running = false;
      this.controller.stopDebugging();
      this.dropTemporaryBreakpoints();
    }
  }

  /**
   * Asks the executor to stop and releases any pending pause.
   * @public
   */
  public stop(): void {
    this.executor.stopExecution();
    this.controller.stopDebugging();
  }

  public pause(): void {
    if (!this.controller.isPaused()) {
      this.controller.pauseExecution();
    }
  }

  public resume(): void {
    if (this.controller.isPaused()) {
      this.controller.resumeExecution();
    }
  }

  /**
   * Runs the current step and pauses before the next one.
   */
  public stepOver(): void {
    this.controller.setExecutionMode(ExecutionMode.Step);
    this.controller.resumeExecution();
  }

  // Steps have no inner structure to enter
  public stepInto(): void {
    this.stepOver();
  }

  /**
   * Leaves single-stepping and runs until the next breakpoint.
   */
  public stepOut(): void {
    this.controller.setExecutionMode(ExecutionMode.Debug);
    this.controller.resumeExecution();
  }

  /**
   * Runs until `targetStepIndex` starts, through a LINE breakpoint that is
   * removed once that step starts (whichever breakpoint pauses it) or when
   * the run ends.
   * @returns the temporary breakpoint's id
   */
  public runToStep(targetStepIndex: number): string {
    const id = this.controller.addBreakpoint(Breakpoint.line(targetStepIndex));
    this.temporaryBreakpoints.add(id);
    this.controller.setExecutionMode(ExecutionMode.Debug);
    this.controller.resumeExecution();
    return id;
  }

  public isDebugging(): boolean {
    return this.controller.getExecutionMode() !== ExecutionMode.Normal;
  }

  public isPaused(): boolean {
    return this.controller.isPaused();
  }

  public isRunning(): boolean {
    return this.running;
  }

  public getController(): ExecutionController {
    return this.controller;
  }

  private createHooks(): FlowHooks {
    return {
      onStepStart: async (stepIndex: number, step: StepRecord) => {
        await this.controller.onStepStart(stepIndex, step);
        this.dropTemporaryBreakpointsAt(stepIndex);
        this.publish('stepStarted', { stepIndex, step });
      },
      onStepComplete: async (
        stepIndex: number,
        success: boolean,
        message: StepMessage,
      ) => {
        await this.controller.onStepComplete(stepIndex, success, message);
        this.publish('stepCompleted', {
          stepIndex,
          success,
          message: describeMessage(message),
        });
        this.publish('metricsUpdated', this.controller.getPerformanceMetrics());
      },
      onFlowComplete: (success: boolean) => {
        this.controller.onFlowComplete(success);
        this.publish('flowCompleted', { success });
        this.publish('metricsUpdated', this.controller.getPerformanceMetrics());
      },
    };
  }

  private attachControllerObservers(): void {
    this.controller.setBreakpointHitHandler((breakpointId, stepIndex, data) => {
      // Another breakpoint may win the step; temporaries there go either way
      this.dropTemporaryBreakpointsAt(stepIndex);
      this.publish('breakpointHit', { breakpointId, stepIndex, data });
    });
    this.controller.setExecutionPausedHandler((stepIndex) => {
      this.publish('executionPaused', { stepIndex });
      this.publish('metricsUpdated', this.controller.getPerformanceMetrics());
    });
    this.controller.setExecutionResumedHandler((stepIndex) => {
      this.publish('executionResumed', { stepIndex });
    });
    this.controller.setVariableChangedHandler((name, value) => {
      this.publish('variableChanged', { name, value });
    });
    this.controller.setDebugLogHandler((entry) => {
      this.publish('debugLogAdded', entry);
    });
  }

  private dropTemporaryBreakpointsAt(stepIndex: number): void {
    for (const id of this.temporaryBreakpoints) {
      if (this.controller.getBreakpoint(id)?.stepIndex === stepIndex) {
        this.controller.removeBreakpoint(id);
        this.temporaryBreakpoints.delete(id);
      }
    }
  }

  private dropTemporaryBreakpoints(): void {
    for (const id of this.temporaryBreakpoints) {
      this.controller.removeBreakpoint(id);
    }
    this.temporaryBreakpoints.clear();
  }

  // Listener failures are logged; they never reach the executor
  private publish<Name extends keyof FlowRunnerEvents>(
    eventName: Name,
    payload: FlowRunnerEvents[Name],
  ): void {
    this.emit(eventName, payload).catch((error: unknown) => {
      this.logger.error(`Listener for '${String(eventName)}' failed`, error);
    });
  }
}
