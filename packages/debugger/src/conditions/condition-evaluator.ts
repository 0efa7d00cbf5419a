import type { VariableStore } from '@flowscope/models';
import type { Breakpoint } from '../breakpoints/breakpoint.js';
import { coerceToMatch, compareValues } from './compare.js';
import type { Condition, Environment } from './condition-nodes.js';
import { parseCondition } from './parser.js';

const DEFAULT_MAX_CACHED = 256;

/**
 * Evaluates CONDITION expressions and VARIABLE comparisons.
 *
 * Both entry points throw {@link ConditionEvaluationError}; containing the
 * failure is the caller's job.
 */
export class ConditionEvaluator {
  private readonly parsed = new Map<string, Condition>();

  /**
   * @param maxCached - Parsed trees kept; the least recently compiled is
   * dropped first
   */
  public constructor(private readonly maxCached = DEFAULT_MAX_CACHED) {}

  /**
   * Parses an expression, reusing the tree of an identical expression.
   */
  public compile(expression: string): Condition {
    const cached = this.parsed.get(expression);
    if (cached) {
      // Re-insert to mark as most recently used
      this.parsed.delete(expression);
      this.parsed.set(expression, cached);
      return cached;
    }
    const condition = parseCondition(expression);
    this.parsed.set(expression, condition);
    if (this.parsed.size > this.maxCached) {
      const oldest = this.parsed.keys().next();
      if (!oldest.done) {
        this.parsed.delete(oldest.value);
      }
    }
    return condition;
  }

  public get cachedCount(): number {
    return this.parsed.size;
  }

  /**
   * Drops the parsed tree of one expression.
   */
  public forget(expression: string): boolean {
    return this.parsed.delete(expression);
  }

  public clear(): void {
    this.parsed.clear();
  }

  public evaluateExpression(expression: string, environment: Environment): boolean {
    return this.compile(expression).evaluate(environment);
  }

  /**
   * Compares a variable's live value against a VARIABLE breakpoint's
   * configured value.
   */
  public matchesVariable(breakpoint: Breakpoint, currentValue: unknown): boolean {
    const operator = breakpoint.comparisonOperator;
    const expected = coerceToMatch(breakpoint.variableValue, currentValue, operator);
    return compareValues(operator, currentValue, expected);
  }
}

/**
 * Flattens the store's records into a name -> value snapshot.
 */
export function buildEnvironment(store: VariableStore | undefined): Environment {
  if (!store) {
    return {};
  }
  return Object.fromEntries(
    Object.entries(store.getAllVariables()).map(([name, record]) => [
      name,
      record.value,
    ]),
  );
}
