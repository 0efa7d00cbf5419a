import { z } from 'zod';
import { BreakpointType, COMPARISON_OPERATORS } from '@flowscope/models';

/**
 * Persisted breakpoint. Missing fields take the defaults a freshly created
 * LINE breakpoint would have; `id` is generated by the caller when absent.
 */
export const BreakpointDictSchema = z.object({
  id: z.string().min(1).optional(),
  step_index: z.number().int().min(-1).default(0),
  type: z.nativeEnum(BreakpointType).default(BreakpointType.Line),
  condition: z.string().default(''),
  variable_name: z.string().default(''),
  variable_value: z.unknown().optional(),
  comparison_operator: z.enum(COMPARISON_OPERATORS).default('=='),
  enabled: z.boolean().default(true),
  hit_count: z.number().int().nonnegative().default(0),
});
