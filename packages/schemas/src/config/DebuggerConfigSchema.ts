import { z } from 'zod';

export const DebuggerConfigSchema = z.object({
  // Debug log buffer capacity; oldest entries are evicted first
  maxLogEntries: z.number().int().positive().default(1000),
  // Raw samples kept in exported metrics
  metricsSampleLimit: z.number().int().positive().default(100),
  // Unset means a pause lasts until resumed or stopped
  pauseTimeoutMs: z.number().int().positive().optional(),
});
