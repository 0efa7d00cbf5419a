import { describe, it, expect, beforeEach } from 'vitest';
import { BreakpointType } from '@flowscope/models';
import { Breakpoint } from './breakpoint.js';
import { BreakpointRegistry } from './breakpoint-registry.js';

describe('BreakpointRegistry', () => {
  let registry: BreakpointRegistry;

  beforeEach(() => {
    registry = new BreakpointRegistry();
  });

  it('lists breakpoints in insertion order', () => {
    const a = registry.add(Breakpoint.line(5));
    const b = registry.add(Breakpoint.onError());
    const c = registry.add(Breakpoint.line(1));

    expect(registry.list().map((bp) => bp.id)).toEqual([a, b, c]);
    expect(registry.size).toBe(3);
  });

  it('reports unknown ids through return values', () => {
    expect(registry.remove('missing')).toBe(false);
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.setEnabled('missing', false)).toBe(false);
  });

  it('filters enabled breakpoints by type', () => {
    const enabled = registry.add(Breakpoint.onError(2));
    const disabled = registry.add(Breakpoint.onError(3));
    registry.add(Breakpoint.line(2));
    registry.setEnabled(disabled, false);

    expect(registry.enabledOfType(BreakpointType.Error).map((bp) => bp.id)).toEqual([
      enabled,
    ]);
  });

  describe('toggle', () => {
    it('creates a line breakpoint when the step has none', () => {
      const result = registry.toggle(2);

      expect(result.success).toBe(true);
      expect(result.added).toBe(true);
      expect(registry.get(result.result)?.stepIndex).toBe(2);
    });

    it('returns to no breakpoint after toggling twice, whatever the hit count', () => {
      const first = registry.toggle(2);
      registry.get(first.result)?.recordHit();

      const second = registry.toggle(2);

      expect(second).toEqual({
        success: true,
        added: false,
        result: `Removed breakpoint #${first.result}`,
      });
      expect(registry.findLineBreakpoint(2)).toBeUndefined();
      expect(registry.size).toBe(0);
    });

    it('ignores breakpoints of other types at the same step', () => {
      const conditional = registry.add(Breakpoint.conditional(2, 'x == 1'));

      registry.toggle(2);
      registry.toggle(2);

      expect(registry.list().map((bp) => bp.id)).toEqual([conditional]);
    });
  });

  it('serializes every breakpoint to its dict', () => {
    const id = registry.add(Breakpoint.line(7));

    const dicts = registry.toJSON();

    expect(dicts).toHaveLength(1);
    expect(dicts[0].id).toBe(id);
    expect(dicts[0].step_index).toBe(7);
  });
});
