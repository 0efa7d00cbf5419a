import { BreakpointType, type BreakpointDict } from '@flowscope/models';
import { Breakpoint } from './breakpoint.js';

export interface ToggleResult {
  success: boolean;
  /** true when a breakpoint was created, false when one was removed */
  added: boolean;
  /** The new breakpoint id, or a message naming the removed one */
  result: string;
}

/**
 * Breakpoint definitions keyed by id, in insertion order.
 *
 * Lookups by unknown id report failure through their return value.
 */
export class BreakpointRegistry {
  private readonly breakpoints = new Map<string, Breakpoint>();

  public add(breakpoint: Breakpoint): string {
    this.breakpoints.set(breakpoint.id, breakpoint);
    return breakpoint.id;
  }

  public remove(id: string): boolean {
    return this.breakpoints.delete(id);
  }

  public get(id: string): Breakpoint | undefined {
    return this.breakpoints.get(id);
  }

  public list(): Breakpoint[] {
    return Array.from(this.breakpoints.values());
  }

  /**
   * Enabled breakpoints of one kind, in insertion order.
   */
  public enabledOfType(type: BreakpointType): Breakpoint[] {
    return this.list().filter((bp) => bp.enabled && bp.type === type);
  }

  public get size(): number {
    return this.breakpoints.size;
  }

  public clear(): void {
    this.breakpoints.clear();
  }

  public setEnabled(id: string, enabled: boolean): boolean {
    const breakpoint = this.breakpoints.get(id);
    if (!breakpoint) {
      return false;
    }
    breakpoint.enabled = enabled;
    return true;
  }

  public findLineBreakpoint(stepIndex: number): Breakpoint | undefined {
    return this.list().find(
      (bp) => bp.type === BreakpointType.Line && bp.stepIndex === stepIndex,
    );
  }

  /**
   * Removes the LINE breakpoint at `stepIndex` if there is one, otherwise
   * creates it.
   */
  public toggle(stepIndex: number): ToggleResult {
    const existing = this.findLineBreakpoint(stepIndex);
    if (existing) {
      this.remove(existing.id);
      return {
        success: true,
        added: false,
        result: `Removed breakpoint #${existing.id}`,
      };
    }

    const id = this.add(Breakpoint.line(stepIndex));
    return { success: true, added: true, result: id };
  }

  public toJSON(): BreakpointDict[] {
    return this.list().map((bp) => bp.toDict());
  }
}
