import type { ComparisonOperator } from '@flowscope/models';
import { compareValues } from './compare.js';
import { ConditionEvaluationError } from './errors.js';

/** Variable snapshot a condition is evaluated against */
export type Environment = Readonly<Record<string, unknown>>;

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';
export type LogicalOperator = 'and' | 'or' | 'not';

export class LiteralValue {
  public readonly kind = 'literal';

  public constructor(public readonly value: string | number | boolean | null) {}

  public resolve(): unknown {
    return this.value;
  }
}

export class VariableReference {
  public readonly kind = 'variable';

  public constructor(public readonly name: string) {}

  public resolve(environment: Environment): unknown {
    if (!Object.hasOwn(environment, this.name)) {
      throw ConditionEvaluationError.unknownVariable(this.name);
    }
    return environment[this.name];
  }
}

export class ListValue {
  public readonly kind = 'list';

  public constructor(public readonly items: readonly ValueExpression[]) {}

  public resolve(environment: Environment): unknown[] {
    return this.items.map((item) => item.resolve(environment));
  }
}

export class NegatedValue {
  public readonly kind = 'negate';

  public constructor(public readonly operand: ValueExpression) {}

  public resolve(environment: Environment): number {
    const value = this.operand.resolve(environment);
    if (typeof value !== 'number') {
      throw ConditionEvaluationError.typeMismatch('-', 0, value);
    }
    return -value;
  }
}

export class ArithmeticValue {
  public readonly kind = 'arithmetic';

  public constructor(
    public readonly operator: ArithmeticOperator,
    public readonly left: ValueExpression,
    public readonly right: ValueExpression,
  ) {}

  public resolve(environment: Environment): number | string {
    const left = this.left.resolve(environment);
    const right = this.right.resolve(environment);

    if (
      this.operator === '+' &&
      typeof left === 'string' &&
      typeof right === 'string'
    ) {
      return left + right;
    }
    if (typeof left !== 'number' || typeof right !== 'number') {
      throw ConditionEvaluationError.typeMismatch(this.operator, left, right);
    }

    switch (this.operator) {
      case '+':
        return left + right;
      case '-':
        return left - right;
      case '*':
        return left * right;
      case '/':
        if (right === 0) throw ConditionEvaluationError.divisionByZero();
        return left / right;
      case '%':
        if (right === 0) throw ConditionEvaluationError.divisionByZero();
        return left % right;
    }
  }
}

export type ValueExpression =
  | LiteralValue
  | VariableReference
  | ListValue
  | NegatedValue
  | ArithmeticValue;

/**
 * `lhs op rhs` over two value expressions.
 */
export class ComparisonCondition {
  public readonly kind = 'comparison';

  public constructor(
    public readonly lhs: ValueExpression,
    public readonly operator: ComparisonOperator,
    public readonly rhs: ValueExpression,
  ) {}

  public evaluate(environment: Environment): boolean {
    return compareValues(
      this.operator,
      this.lhs.resolve(environment),
      this.rhs.resolve(environment),
    );
  }
}

/**
 * `and` / `or` over two or more conditions (short-circuiting), or `not`
 * over exactly one.
 */
export class LogicalCondition {
  public readonly kind = 'logical';

  public constructor(
    public readonly operator: LogicalOperator,
    public readonly operands: readonly Condition[],
  ) {}

  public evaluate(environment: Environment): boolean {
    switch (this.operator) {
      case 'and':
        return this.operands.every((operand) => operand.evaluate(environment));
      case 'or':
        return this.operands.some((operand) => operand.evaluate(environment));
      case 'not':
        return !this.operands[0].evaluate(environment);
    }
  }
}

export type Condition = ComparisonCondition | LogicalCondition;
