import { describe, it, expect } from 'vitest';
import { ANY_STEP, BreakpointType } from '@flowscope/models';
import { Breakpoint } from './breakpoint.js';
import { BreakpointValidationError } from './errors.js';

describe('Breakpoint', () => {
  it('assigns distinct ids', () => {
    const first = Breakpoint.line(1);
    const second = Breakpoint.line(1);

    expect(first.id).not.toBe(second.id);
    expect(first.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('targets its own step or any step through the wildcard', () => {
    expect(Breakpoint.line(3).targets(3)).toBe(true);
    expect(Breakpoint.line(3).targets(4)).toBe(false);
    expect(Breakpoint.onError().stepIndex).toBe(ANY_STEP);
    expect(Breakpoint.onError().targets(42)).toBe(true);
  });

  it('counts hits one at a time', () => {
    const breakpoint = Breakpoint.line(0);

    expect(breakpoint.recordHit()).toBe(1);
    expect(breakpoint.recordHit()).toBe(2);
    expect(breakpoint.hitCount).toBe(2);
  });

  it('serializes to the snake_case dict', () => {
    const breakpoint = Breakpoint.onVariable('count', '>', 10);
    breakpoint.recordHit();

    expect(breakpoint.toDict()).toEqual({
      id: breakpoint.id,
      step_index: -1,
      type: 'variable',
      condition: '',
      variable_name: 'count',
      variable_value: '10',
      comparison_operator: '>',
      enabled: true,
      hit_count: 1,
    });
  });

  it('stringifies list values as JSON and leaves a missing value null', () => {
    expect(Breakpoint.onVariable('tag', 'in', ['a', 'b']).toDict().variable_value).toBe(
      '["a","b"]',
    );
    expect(Breakpoint.line(0).toDict().variable_value).toBeNull();
  });

  it('restores every field, hit count included, from its dict', () => {
    const original = Breakpoint.conditional(4, 'retries >= 3');
    original.enabled = false;
    original.recordHit();
    original.recordHit();

    const restored = Breakpoint.fromDict(original.toDict());

    expect(restored.toDict()).toEqual(original.toDict());
    expect(restored.hitCount).toBe(2);
    expect(restored.type).toBe(BreakpointType.Condition);
  });

  it('rejects a malformed dict with the failing fields', () => {
    expect(() => Breakpoint.fromDict({ step_index: 'two', type: 'watch' })).toThrow(
      BreakpointValidationError,
    );

    expect(() => Breakpoint.fromDict({ step_index: -5 })).toThrow(
      /^Invalid breakpoint: step_index: /,
    );
  });
});
