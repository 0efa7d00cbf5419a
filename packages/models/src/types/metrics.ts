/**
 * Wall-clock timing of one step, in epoch seconds. `end` and `duration`
 * stay 0 until the step completes.
 */
export interface StepTiming {
  start: number;
  end: number;
  duration: number;
}

export interface MemorySample {
  timestamp: number;
  /** Resident set size in bytes */
  rss: number;
  /** Reserved heap plus external memory in bytes */
  vms: number;
}

export interface CpuSample {
  timestamp: number;
  percent: number;
}

/** Averages in megabytes */
export interface AverageMemoryUsage {
  rss: number;
  vms: number;
}

/**
 * Exported metrics snapshot.
 */
export interface PerformanceMetricsDict {
  total_time: number;
  step_times: Record<number, StepTiming>;
  avg_memory_usage: AverageMemoryUsage;
  avg_cpu_usage: number;
  memory_usage: MemorySample[];
  cpu_usage: CpuSample[];
}
