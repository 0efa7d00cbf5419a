import type {
  AverageMemoryUsage,
  CpuSample,
  MemorySample,
  PerformanceMetricsDict,
  StepTiming,
} from '@flowscope/models';
import { createScopedLogger, type ILogger } from '@flowscope/core';
import { NodeProcessSampler, type ProcessSampler } from './process-sampler.js';

const BYTES_PER_MB = 1024 * 1024;
const DEFAULT_SAMPLE_LIMIT = 100;

export interface PerformanceMetricsOptions {
  sampler?: ProcessSampler;
  /** Epoch seconds */
  clock?: () => number;
  /** Raw samples included in {@link PerformanceMetrics.toDict} */
  sampleLimit?: number;
  logger?: ILogger;
}

/**
 * Per-step timers plus memory/CPU samples taken at every timer transition.
 */
export class PerformanceMetrics {
  private startTime = 0;
  private endTime = 0;
  private started = false;
  private monitoring = false;
  private stepTimes = new Map<number, StepTiming>();
  private memoryUsage: MemorySample[] = [];
  private cpuUsage: CpuSample[] = [];
  private readonly sampler: ProcessSampler;
  private readonly clock: () => number;
  private readonly sampleLimit: number;
  private readonly logger: ILogger;

  public constructor(options: PerformanceMetricsOptions = {}) {
    this.sampler = options.sampler ?? new NodeProcessSampler();
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.sampleLimit = options.sampleLimit ?? DEFAULT_SAMPLE_LIMIT;
    this.logger = options.logger ?? createScopedLogger('debugger:metrics');
  }

  /**
   * Resets every sample and timer, then takes a baseline sample.
   */
  public startMonitoring(): void {
    this.startTime = this.clock();
    this.endTime = 0;
    this.started = true;
    this.monitoring = true;
    this.stepTimes = new Map();
    this.memoryUsage = [];
    this.cpuUsage = [];
    this.collect();
  }

  /**
   * Records the end time. No-op when nothing is being monitored.
   */
  public stopMonitoring(): void {
    if (!this.monitoring) {
      return;
    }
    this.endTime = this.clock();
    this.monitoring = false;
  }

  public isMonitoring(): boolean {
    return this.monitoring;
  }

  public startStepTimer(stepIndex: number): void {
    this.stepTimes.set(stepIndex, { start: this.clock(), end: 0, duration: 0 });
    this.collect();
  }

  public stopStepTimer(stepIndex: number): void {
    const timing = this.stepTimes.get(stepIndex);
    if (timing) {
      timing.end = this.clock();
      timing.duration = timing.end - timing.start;
    }
    this.collect();
  }

  /**
   * Seconds since monitoring started, frozen once it stops.
   */
  public getTotalExecutionTime(): number {
    if (!this.started) {
      return 0;
    }
    if (this.monitoring) {
      return this.clock() - this.startTime;
    }
    return this.endTime - this.startTime;
  }

  public getStepExecutionTime(stepIndex: number): number {
    return this.stepTimes.get(stepIndex)?.duration ?? 0;
  }

  public getAverageMemoryUsage(): AverageMemoryUsage {
    if (this.memoryUsage.length === 0) {
      return { rss: 0, vms: 0 };
    }
    return {
      rss: average(this.memoryUsage.map((s) => s.rss)) / BYTES_PER_MB,
      vms: average(this.memoryUsage.map((s) => s.vms)) / BYTES_PER_MB,
    };
  }

  public getAverageCpuUsage(): number {
    if (this.cpuUsage.length === 0) {
      return 0;
    }
    return average(this.cpuUsage.map((s) => s.percent));
  }

  public toDict(): PerformanceMetricsDict {
    const stepTimes: Record<number, StepTiming> = {};
    for (const [index, timing] of this.stepTimes) {
      stepTimes[index] = { ...timing };
    }
    return {
      total_time: this.getTotalExecutionTime(),
      step_times: stepTimes,
      avg_memory_usage: this.getAverageMemoryUsage(),
      avg_cpu_usage: this.getAverageCpuUsage(),
      memory_usage: this.memoryUsage.slice(-this.sampleLimit),
      cpu_usage: this.cpuUsage.slice(-this.sampleLimit),
    };
  }

  private collect(): void {
    try {
      const sample = this.sampler.sample();
      const timestamp = this.clock();
      this.memoryUsage.push({ timestamp, rss: sample.rss, vms: sample.vms });
      this.cpuUsage.push({ timestamp, percent: sample.cpuPercent });
    } catch (error) {
      this.logger.warn('Failed to collect performance sample', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function average(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
