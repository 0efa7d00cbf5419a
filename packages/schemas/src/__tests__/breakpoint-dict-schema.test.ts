import { describe, it, expect } from 'vitest';
import { BreakpointType } from '@flowscope/models';
import { BreakpointDictSchema } from '../index.js';

describe('BreakpointDictSchema', () => {
  it('fills defaults for a minimal dict', () => {
    const result = BreakpointDictSchema.parse({});

    expect(result).toEqual({
      step_index: 0,
      type: BreakpointType.Line,
      condition: '',
      variable_name: '',
      comparison_operator: '==',
      enabled: true,
      hit_count: 0,
    });
  });

  it('accepts a complete variable breakpoint', () => {
    const result = BreakpointDictSchema.parse({
      id: 'bp-1',
      step_index: -1,
      type: 'variable',
      condition: '',
      variable_name: 'count',
      variable_value: '10',
      comparison_operator: '>=',
      enabled: false,
      hit_count: 4,
    });

    expect(result.type).toBe(BreakpointType.Variable);
    expect(result.variable_value).toBe('10');
    expect(result.comparison_operator).toBe('>=');
    expect(result.hit_count).toBe(4);
  });

  it('accepts the two-word membership operator', () => {
    const result = BreakpointDictSchema.parse({ comparison_operator: 'not in' });
    expect(result.comparison_operator).toBe('not in');
  });

  it('rejects unknown breakpoint types', () => {
    expect(() => BreakpointDictSchema.parse({ type: 'watch' })).toThrow();
  });

  it('rejects unknown operators', () => {
    expect(() =>
      BreakpointDictSchema.parse({ comparison_operator: '===' }),
    ).toThrow();
  });

  it('rejects negative hit counts and fractional step indexes', () => {
    expect(() => BreakpointDictSchema.parse({ hit_count: -1 })).toThrow();
    expect(() => BreakpointDictSchema.parse({ step_index: 1.5 })).toThrow();
  });

  it('rejects step indexes below the wildcard', () => {
    expect(() => BreakpointDictSchema.parse({ step_index: -2 })).toThrow();
  });
});
