import { v4 as uuidv4 } from 'uuid';
import {
  ANY_STEP,
  BreakpointType,
  type BreakpointDict,
  type ComparisonOperator,
} from '@flowscope/models';
import { BreakpointDictSchema } from '@flowscope/schemas';
import { BreakpointValidationError } from './errors.js';

export interface BreakpointInit {
  stepIndex: number;
  type?: BreakpointType;
  condition?: string;
  variableName?: string;
  variableValue?: unknown;
  comparisonOperator?: ComparisonOperator;
  enabled?: boolean;
  id?: string;
  hitCount?: number;
}

/**
 * A rule that pauses the flow when it matches.
 *
 * Only the execution controller calls {@link Breakpoint.recordHit}; every
 * other field is owned by the controlling side.
 */
export class Breakpoint {
  public readonly id: string;
  public stepIndex: number;
  public type: BreakpointType;
  public condition: string;
  public variableName: string;
  public variableValue: unknown;
  public comparisonOperator: ComparisonOperator;
  public enabled: boolean;
  private hits: number;

  public constructor(init: BreakpointInit) {
    this.id = init.id ?? uuidv4();
    this.stepIndex = init.stepIndex;
    this.type = init.type ?? BreakpointType.Line;
    this.condition = init.condition ?? '';
    this.variableName = init.variableName ?? '';
    this.variableValue = init.variableValue ?? null;
    this.comparisonOperator = init.comparisonOperator ?? '==';
    this.enabled = init.enabled ?? true;
    this.hits = init.hitCount ?? 0;
  }

  public static line(stepIndex: number): Breakpoint {
    return new Breakpoint({ stepIndex, type: BreakpointType.Line });
  }

  public static conditional(stepIndex: number, condition: string): Breakpoint {
    return new Breakpoint({
      stepIndex,
      type: BreakpointType.Condition,
      condition,
    });
  }

  public static onError(stepIndex: number = ANY_STEP): Breakpoint {
    return new Breakpoint({ stepIndex, type: BreakpointType.Error });
  }

  public static onVariable(
    variableName: string,
    comparisonOperator: ComparisonOperator,
    variableValue: unknown,
  ): Breakpoint {
    return new Breakpoint({
      stepIndex: ANY_STEP,
      type: BreakpointType.Variable,
      variableName,
      variableValue,
      comparisonOperator,
    });
  }

  public get hitCount(): number {
    return this.hits;
  }

  /**
   * Counts one matching event.
   * @returns the new hit count
   */
  public recordHit(): number {
    this.hits += 1;
    return this.hits;
  }

  /**
   * Whether the breakpoint targets `stepIndex`, either directly or through
   * the {@link ANY_STEP} wildcard.
   */
  public targets(stepIndex: number): boolean {
    return this.stepIndex === ANY_STEP || this.stepIndex === stepIndex;
  }

  public toDict(): BreakpointDict {
    return {
      id: this.id,
      step_index: this.stepIndex,
      type: this.type,
      condition: this.condition,
      variable_name: this.variableName,
      variable_value: stringifyValue(this.variableValue),
      comparison_operator: this.comparisonOperator,
      enabled: this.enabled,
      hit_count: this.hits,
    };
  }

  /**
   * Restores a breakpoint from its persisted dict.
   * @throws {BreakpointValidationError} When the dict does not match the schema
   */
  public static fromDict(data: unknown): Breakpoint {
    const parsed = BreakpointDictSchema.safeParse(data);
    if (!parsed.success) {
      throw BreakpointValidationError.fromZodError(parsed.error);
    }
    const dict = parsed.data;
    return new Breakpoint({
      id: dict.id,
      stepIndex: dict.step_index,
      type: dict.type,
      condition: dict.condition,
      variableName: dict.variable_name,
      variableValue: dict.variable_value,
      comparisonOperator: dict.comparison_operator,
      enabled: dict.enabled,
      hitCount: dict.hit_count,
    });
  }
}

function stringifyValue(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
