import {
  BreakpointType,
  DebugLogLevel,
  ExecutionMode,
  type BreakpointDict,
  type DebugLogEntry,
  type ExportResult,
  type FlowHooks,
  type PerformanceMetricsDict,
  type StepMessage,
  type StepRecord,
  type VariableStore,
} from '@flowscope/models';
import type { DebuggerConfig, DebuggerConfigInput } from '@flowscope/schemas';
import { createScopedLogger, type ILogger } from '@flowscope/core';
import { Breakpoint } from '../breakpoints/breakpoint.js';
import {
  BreakpointRegistry,
  type ToggleResult,
} from '../breakpoints/breakpoint-registry.js';
import {
  ConditionEvaluator,
  buildEnvironment,
} from '../conditions/condition-evaluator.js';
import type { Environment } from '../conditions/condition-nodes.js';
import { resolveDebuggerConfig } from '../config.js';
import { DebugLogBuffer } from '../logging/debug-log-buffer.js';
import { PerformanceMetrics } from '../metrics/performance-metrics.js';
import type { ProcessSampler } from '../metrics/process-sampler.js';
import type {
  BreakpointHitData,
  BreakpointHitHandler,
  DebugLogHandler,
  DebugObservers,
  ExecutionPausedHandler,
  ExecutionResumedHandler,
  StepExecutionHandler,
  VariableChangedHandler,
} from '../types/index.js';
import { ContinueSignal } from './continue-signal.js';

export interface ExecutionControllerOptions {
  variableStore?: VariableStore;
  config?: DebuggerConfigInput;
  /** Environment consulted for configuration, `process.env` by default */
  env?: Record<string, string | undefined>;
  sampler?: ProcessSampler;
  /** Epoch seconds, shared by metrics and the debug log */
  clock?: () => number;
  logger?: ILogger;
}

interface PendingHit {
  breakpoint: Breakpoint;
  data: BreakpointHitData;
}

/**
 * Paces a running flow: the flow executor awaits {@link onStepStart} and
 * {@link onStepComplete} around every step, and those calls suspend in
 * {@link waitForContinue} whenever the mode or a breakpoint asks for a
 * pause. The controlling side releases them with {@link resumeExecution}
 * or {@link stopDebugging}.
 *
 * Evaluation failures and observer exceptions are logged and contained;
 * they never reject a hook, so the executor's outcome is unaffected.
 *
 * @example
 * ```typescript
 * const controller = new ExecutionController({ variableStore: store });
 * controller.toggleBreakpoint(2);
 * controller.setExecutionPausedHandler((step) => ui.showPausedAt(step));
 * controller.startDebugging(ExecutionMode.Debug);
 * await executor.executeFlow(controller);
 * ```
 */
export class ExecutionController implements FlowHooks {
  private mode = ExecutionMode.Normal;
  private paused = false;
  private currentStepIndex = -1;
  private variableStore?: VariableStore;
  private readonly watchVariables = new Set<string>();
  private readonly observers: DebugObservers = {};
  private readonly signal = new ContinueSignal();
  private readonly registry = new BreakpointRegistry();
  private readonly evaluator = new ConditionEvaluator();
  private readonly metrics: PerformanceMetrics;
  private readonly logs: DebugLogBuffer;
  private readonly config: DebuggerConfig;
  private readonly logger: ILogger;

  public constructor(options: ExecutionControllerOptions = {}) {
    this.config = resolveDebuggerConfig(options.config, options.env);
    this.logger = options.logger ?? createScopedLogger('debugger:controller');
    this.variableStore = options.variableStore;
    this.metrics = new PerformanceMetrics({
      sampler: options.sampler,
      clock: options.clock,
      sampleLimit: this.config.metricsSampleLimit,
      logger: this.logger,
    });
    this.logs = new DebugLogBuffer({
      maxEntries: this.config.maxLogEntries,
      clock: options.clock,
      logger: this.logger,
      onEntry: (entry) => this.notifyDebugLog(entry),
    });
  }

  public setVariableStore(store: VariableStore | undefined): void {
    this.variableStore = store;
  }

  public setExecutionMode(mode: ExecutionMode): void {
    this.mode = mode;
  }

  public getExecutionMode(): ExecutionMode {
    return this.mode;
  }

  public isPaused(): boolean {
    return this.paused;
  }

  public getCurrentStepIndex(): number {
    return this.currentStepIndex;
  }

  // Breakpoints

  public addBreakpoint(breakpoint: Breakpoint): string {
    return this.registry.add(breakpoint);
  }

  /**
   * Restores persisted breakpoints next to the existing ones.
   * @throws {BreakpointValidationError} When a dict is malformed; nothing is added then
   */
  public importBreakpoints(dicts: readonly unknown[]): string[] {
    const restored = dicts.map((dict) => Breakpoint.fromDict(dict));
    return restored.map((breakpoint) => this.registry.add(breakpoint));
  }

  public removeBreakpoint(id: string): boolean {
    const breakpoint = this.registry.get(id);
    if (!breakpoint || !this.registry.remove(id)) {
      return false;
    }
    const condition = breakpoint.condition;
    if (condition && !this.registry.list().some((bp) => bp.condition === condition)) {
      this.evaluator.forget(condition);
    }
    return true;
  }

  public getBreakpoint(id: string): Breakpoint | undefined {
    return this.registry.get(id);
  }

  public getBreakpoints(): BreakpointDict[] {
    return this.registry.toJSON();
  }

  public clearBreakpoints(): void {
    this.registry.clear();
    this.evaluator.clear();
  }

  public enableBreakpoint(id: string, enabled = true): boolean {
    return this.registry.setEnabled(id, enabled);
  }

  public toggleBreakpoint(stepIndex: number): ToggleResult {
    return this.registry.toggle(stepIndex);
  }

  // Watch variables

  public addWatchVariable(name: string): boolean {
    if (!name || this.watchVariables.has(name)) {
      return false;
    }
    this.watchVariables.add(name);
    return true;
  }

  public removeWatchVariable(name: string): boolean {
    return this.watchVariables.delete(name);
  }

  public getWatchVariables(): string[] {
    return Array.from(this.watchVariables);
  }

  public clearWatchVariables(): void {
    this.watchVariables.clear();
  }

  public getWatchVariableValues(): Record<string, unknown> {
    const store = this.variableStore;
    if (!store) {
      return {};
    }
    const values: Record<string, unknown> = {};
    for (const name of this.watchVariables) {
      values[name] = store.getVariable(name);
    }
    return values;
  }

  // Execution control

  public startDebugging(mode: ExecutionMode = ExecutionMode.Debug): void {
    this.mode = mode;
    this.paused = false;
    this.signal.set();
    this.currentStepIndex = -1;
    this.metrics.startMonitoring();
    this.logs.add(DebugLogLevel.Info, `Debugging started in ${mode} mode`);
  }

  public pauseExecution(): void {
    this.paused = true;
    this.signal.clear();
    this.logs.add(DebugLogLevel.Debug, 'Execution paused');
    const handler = this.observers.executionPaused;
    if (handler) {
      this.safely('executionPaused', () => handler(this.currentStepIndex));
    }
  }

  public resumeExecution(): void {
    this.paused = false;
    this.signal.set();
    this.logs.add(DebugLogLevel.Debug, 'Execution resumed');
    const handler = this.observers.executionResumed;
    if (handler) {
      this.safely('executionResumed', () => handler(this.currentStepIndex));
    }
  }

  /**
   * Ends the session: back to NORMAL, any suspended hook released, metrics
   * stopped. Safe to call repeatedly and without an active session.
   */
  public stopDebugging(): void {
    this.mode = ExecutionMode.Normal;
    this.paused = false;
    this.signal.set();
    this.metrics.stopMonitoring();
    this.logs.add(DebugLogLevel.Debug, 'Debugging stopped');
  }

  /**
   * The single suspension point: resolves once the pause/resume signal is
   * set, or when the configured pause timeout expires.
   */
  public async waitForContinue(): Promise<void> {
    const timeoutMs = this.config.pauseTimeoutMs;
    const released = await this.signal.wait(timeoutMs);
    if (!released) {
      this.logs.add(
        DebugLogLevel.Warning,
        `Pause timed out after ${timeoutMs}ms, resuming`,
      );
      this.resumeExecution();
    }
  }

  // Flow executor hooks

  public async onStepStart(stepIndex: number, step: StepRecord): Promise<void> {
    this.currentStepIndex = stepIndex;
    this.metrics.startStepTimer(stepIndex);

    switch (this.mode) {
      case ExecutionMode.Step: {
        this.pauseExecution();
        const handler = this.observers.stepExecution;
        if (handler) {
          this.safely('stepExecution', () => handler(stepIndex, step));
        }
        await this.waitForContinue();
        break;
      }
      case ExecutionMode.Debug: {
        const hit = this.matchStartBreakpoints(stepIndex, step);
        if (hit) {
          await this.suspendOnHit(hit, stepIndex);
        } else if (this.paused) {
          // Manual pause requested while running
          await this.waitForContinue();
        }
        break;
      }
      case ExecutionMode.Normal:
        break;
      default: {
        const unreachable: never = this.mode;
        throw new Error(`Unhandled execution mode ${String(unreachable)}`);
      }
    }

    const actionId = typeof step.action_id === 'string' ? step.action_id : '';
    this.logs.add(DebugLogLevel.Info, `Step #${stepIndex} (${actionId}) started`);
  }

  public async onStepComplete(
    stepIndex: number,
    success: boolean,
    message: StepMessage,
  ): Promise<void> {
    this.metrics.stopStepTimer(stepIndex);

    const text = describeMessage(message);
    this.logs.add(
      success ? DebugLogLevel.Success : DebugLogLevel.Error,
      `Step #${stepIndex} ${success ? 'completed' : 'failed'}: ${text}`,
    );

    let suspended = false;
    if (!success && this.mode === ExecutionMode.Debug) {
      const hit = this.matchErrorBreakpoints(stepIndex, text);
      if (hit) {
        await this.suspendOnHit(hit, stepIndex);
        suspended = true;
      }
    }

    await this.checkVariables(suspended);
  }

  public onFlowComplete(success: boolean): void {
    this.metrics.stopMonitoring();
    this.mode = ExecutionMode.Normal;
    this.paused = false;
    this.signal.set();

    this.logs.add(
      success ? DebugLogLevel.Success : DebugLogLevel.Error,
      success ? 'Flow completed successfully' : 'Flow failed',
    );

    const totalTime = this.metrics.getTotalExecutionTime();
    const memory = this.metrics.getAverageMemoryUsage();
    const cpu = this.metrics.getAverageCpuUsage();
    this.logs.add(
      DebugLogLevel.Info,
      `Execution stats: total=${totalTime.toFixed(2)}s, ` +
        `avg memory=${memory.rss.toFixed(2)}MB, avg CPU=${cpu.toFixed(2)}%`,
    );
  }

  // Observers

  public setBreakpointHitHandler(handler?: BreakpointHitHandler): void {
    this.observers.breakpointHit = handler;
  }

  public setStepExecutionHandler(handler?: StepExecutionHandler): void {
    this.observers.stepExecution = handler;
  }

  public setVariableChangedHandler(handler?: VariableChangedHandler): void {
    this.observers.variableChanged = handler;
  }

  public setExecutionPausedHandler(handler?: ExecutionPausedHandler): void {
    this.observers.executionPaused = handler;
  }

  public setExecutionResumedHandler(handler?: ExecutionResumedHandler): void {
    this.observers.executionResumed = handler;
  }

  public setDebugLogHandler(handler?: DebugLogHandler): void {
    this.observers.debugLog = handler;
  }

  // Telemetry

  public getPerformanceMetrics(): PerformanceMetricsDict {
    return this.metrics.toDict();
  }

  public getDebugLogs(filterLevel?: DebugLogLevel): DebugLogEntry[] {
    return this.logs.getLogs(filterLevel);
  }

  public clearDebugLogs(): void {
    this.logs.clear();
  }

  public exportDebugLogs(filePath: string): Promise<ExportResult> {
    return this.logs.exportText(filePath);
  }

  public exportDebugLogsJson(filePath: string): Promise<ExportResult> {
    return this.logs.exportJson(filePath);
  }

  // Internals

  /**
   * LINE and CONDITION breakpoints for a starting step. Every match is
   * counted; the first one is returned.
   */
  private matchStartBreakpoints(
    stepIndex: number,
    step: StepRecord,
  ): PendingHit | undefined {
    let first: PendingHit | undefined;
    let environment: Environment | undefined;

    for (const breakpoint of this.registry.list()) {
      if (!breakpoint.enabled) {
        continue;
      }

      let matched = false;
      if (breakpoint.type === BreakpointType.Line) {
        matched = breakpoint.stepIndex === stepIndex;
      } else if (
        breakpoint.type === BreakpointType.Condition &&
        breakpoint.condition &&
        breakpoint.targets(stepIndex)
      ) {
        environment ??= buildEnvironment(this.variableStore);
        matched = this.evaluateCondition(breakpoint, environment);
      }

      if (matched) {
        breakpoint.recordHit();
        first ??= { breakpoint, data: step };
      }
    }

    return first;
  }

  private matchErrorBreakpoints(
    stepIndex: number,
    errorMessage: string,
  ): PendingHit | undefined {
    let first: PendingHit | undefined;
    for (const breakpoint of this.registry.enabledOfType(BreakpointType.Error)) {
      if (!breakpoint.targets(stepIndex)) {
        continue;
      }
      breakpoint.recordHit();
      first ??= { breakpoint, data: { errorMessage } };
    }
    return first;
  }

  /**
   * Level-triggered: in DEBUG mode every enabled VARIABLE breakpoint whose
   * comparison holds fires on every completed step. Watched variables the
   * store knows are reported afterwards whatever the mode.
   */
  private async checkVariables(alreadySuspended: boolean): Promise<void> {
    const store = this.variableStore;
    if (!store) {
      return;
    }

    if (this.mode === ExecutionMode.Debug) {
      let first: PendingHit | undefined;
      for (const breakpoint of this.registry.enabledOfType(
        BreakpointType.Variable,
      )) {
        const value = store.getVariable(breakpoint.variableName);
        if (value === undefined) {
          continue;
        }
        if (this.evaluateVariable(breakpoint, value)) {
          breakpoint.recordHit();
          first ??= {
            breakpoint,
            data: { variableName: breakpoint.variableName, variableValue: value },
          };
        }
      }

      if (first && !alreadySuspended) {
        await this.suspendOnHit(first, this.currentStepIndex);
      }
    }

    const handler = this.observers.variableChanged;
    if (handler) {
      for (const name of this.watchVariables) {
        const value = store.getVariable(name);
        if (value !== undefined) {
          this.safely('variableChanged', () => handler(name, value));
        }
      }
    }
  }

  private async suspendOnHit(hit: PendingHit, stepIndex: number): Promise<void> {
    const { breakpoint, data } = hit;
    this.logs.add(
      DebugLogLevel.Info,
      `Breakpoint #${breakpoint.id} (${breakpoint.type}) hit at step #${stepIndex}`,
    );
    // Paused before observers run, so a resume issued from one is kept
    this.pauseExecution();
    const handler = this.observers.breakpointHit;
    if (handler) {
      this.safely('breakpointHit', () => handler(breakpoint.id, stepIndex, data));
    }
    await this.waitForContinue();
  }

  private evaluateCondition(
    breakpoint: Breakpoint,
    environment: Environment,
  ): boolean {
    try {
      return this.evaluator.evaluateExpression(breakpoint.condition, environment);
    } catch (error) {
      this.logs.add(
        DebugLogLevel.Error,
        `Condition breakpoint #${breakpoint.id} evaluation failed: ${errorText(error)}`,
      );
      return false;
    }
  }

  private evaluateVariable(breakpoint: Breakpoint, value: unknown): boolean {
    try {
      return this.evaluator.matchesVariable(breakpoint, value);
    } catch (error) {
      this.logs.add(
        DebugLogLevel.Error,
        `Variable breakpoint #${breakpoint.id} evaluation failed: ${errorText(error)}`,
      );
      return false;
    }
  }

  private notifyDebugLog(entry: DebugLogEntry): void {
    const handler = this.observers.debugLog;
    if (!handler) {
      return;
    }
    try {
      handler(entry);
    } catch (error) {
      // Not recorded in the debug log itself, which would call back here
      this.logger.error('debugLog observer failed', error);
    }
  }

  private safely(observer: keyof DebugObservers, invoke: () => void): void {
    try {
      invoke();
    } catch (error) {
      this.logger.error(`${observer} observer failed`, error);
      this.logs.add(
        DebugLogLevel.Error,
        `Observer '${observer}' failed: ${errorText(error)}`,
      );
    }
  }
}

/**
 * Text form of a step completion message.
 */
export function describeMessage(message: StepMessage): string {
  if (typeof message === 'string') {
    return message;
  }
  const text = message.message;
  if (typeof text === 'string') {
    return text;
  }
  return JSON.stringify(message);
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
