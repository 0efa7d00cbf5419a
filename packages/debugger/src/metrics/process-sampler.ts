export interface ProcessSample {
  /** Resident set size in bytes */
  rss: number;
  /** Reserved heap plus external memory in bytes */
  vms: number;
  cpuPercent: number;
}

/**
 * Source of memory and CPU readings for the metrics collector.
 */
export interface ProcessSampler {
  sample(): ProcessSample;
}

/**
 * Reads the current Node.js process.
 *
 * Node exposes no virtual-size figure, so `vms` reports the reserved V8
 * heap plus external allocations. CPU percent is user + system time spent
 * since the previous sample, relative to wall time.
 */
export class NodeProcessSampler implements ProcessSampler {
  private lastCpu = process.cpuUsage();
  private lastTime = process.hrtime.bigint();

  public sample(): ProcessSample {
    const memory = process.memoryUsage();
    const cpu = process.cpuUsage(this.lastCpu);
    const now = process.hrtime.bigint();
    const elapsedMicros = Number(now - this.lastTime) / 1000;

    this.lastCpu = process.cpuUsage();
    this.lastTime = now;

    const cpuPercent =
      elapsedMicros > 0 ? ((cpu.user + cpu.system) / elapsedMicros) * 100 : 0;

    return {
      rss: memory.rss,
      vms: memory.heapTotal + memory.external,
      cpuPercent,
    };
  }
}
