import type { ComparisonOperator } from '@flowscope/models';
import {
  ArithmeticValue,
  ComparisonCondition,
  ListValue,
  LiteralValue,
  LogicalCondition,
  NegatedValue,
  VariableReference,
  type ArithmeticOperator,
  type Condition,
  type ValueExpression,
} from './condition-nodes.js';
import { ConditionEvaluationError } from './errors.js';
import { tokenize, type Token } from './tokenizer.js';

const COMPARISON_SYMBOLS = new Set(['==', '!=', '>', '<', '>=', '<=']);
const ARITHMETIC_SYMBOLS = new Set(['+', '-', '*', '/', '%']);
const LITERAL_NAMES: Record<string, boolean | null> = {
  true: true,
  false: false,
  null: null,
  True: true,
  False: false,
  None: null,
};
const RESERVED_NAMES = new Set(['and', 'or', 'not', 'in']);

/**
 * Parses a condition expression.
 *
 * Grammar, loosest binding first:
 *
 * ```
 * condition  := or
 * or         := and (('or' | '||') and)*
 * and        := not (('and' | '&&') not)*
 * not        := ('not' | '!') not | '(' condition ')' | comparison
 * comparison := sum ('==' | '!=' | '>' | '<' | '>=' | '<=' | 'in' | 'not in') sum
 * sum        := product (('+' | '-') product)*
 * product    := unary (('*' | '/' | '%') unary)*
 * unary      := '-' unary | primary
 * primary    := number | string | true | false | null | name
 *             | '[' (sum (',' sum)* ','?)? ']' | '(' sum ')'
 * ```
 *
 * @throws {ConditionEvaluationError} For anything outside the grammar
 */
export function parseCondition(source: string): Condition {
  if (source.trim() === '') {
    throw ConditionEvaluationError.parse('Empty condition', 0);
  }
  return new ConditionParser(tokenize(source)).parse();
}

class ConditionParser {
  private index = 0;

  public constructor(private readonly tokens: Token[]) {}

  public parse(): Condition {
    const condition = this.parseOr();
    const token = this.peek();
    if (token.type !== 'eof') {
      throw this.unexpected(token);
    }
    return condition;
  }

  private parseOr(): Condition {
    const operands = [this.parseAnd()];
    while (this.matchKeyword('or', '||')) {
      operands.push(this.parseAnd());
    }
    return operands.length === 1 ? operands[0] : new LogicalCondition('or', operands);
  }

  private parseAnd(): Condition {
    const operands = [this.parseNot()];
    while (this.matchKeyword('and', '&&')) {
      operands.push(this.parseNot());
    }
    return operands.length === 1 ? operands[0] : new LogicalCondition('and', operands);
  }

  private parseNot(): Condition {
    if (this.matchKeyword('not', '!')) {
      return new LogicalCondition('not', [this.parseNot()]);
    }
    if (this.isSymbol(this.peek(), '(')) {
      return this.parseGroupOrComparison();
    }
    return this.parseComparison();
  }

  /**
   * `(` opens either a nested condition or a parenthesised operand such as
   * `(a + 1) > 3`. Try the condition first and fall back when the group
   * turns out to be the left side of a comparison.
   */
  private parseGroupOrComparison(): Condition {
    const start = this.index;
    try {
      this.advance();
      const inner = this.parseOr();
      this.expectSymbol(')');
      const next = this.peek();
      if (!this.continuesOperand(next)) {
        return inner;
      }
    } catch (error) {
      if (!(error instanceof ConditionEvaluationError)) {
        throw error;
      }
    }
    this.index = start;
    return this.parseComparison();
  }

  private parseComparison(): Condition {
    const lhs = this.parseSum();
    const operator = this.matchComparisonOperator();
    if (!operator) {
      const token = this.peek();
      throw ConditionEvaluationError.unsupported(
        'A value without a comparison',
        token.position,
      );
    }
    const rhs = this.parseSum();

    const trailing = this.peek();
    if (this.isComparisonStart(trailing)) {
      throw ConditionEvaluationError.unsupported(
        'Chained comparison',
        trailing.position,
      );
    }
    return new ComparisonCondition(lhs, operator, rhs);
  }

  private parseSum(): ValueExpression {
    let left = this.parseProduct();
    for (;;) {
      const token = this.peek();
      if (!this.isSymbol(token, '+') && !this.isSymbol(token, '-')) {
        return left;
      }
      this.advance();
      left = new ArithmeticValue(this.arithmetic(token), left, this.parseProduct());
    }
  }

  private parseProduct(): ValueExpression {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      if (
        !this.isSymbol(token, '*') &&
        !this.isSymbol(token, '/') &&
        !this.isSymbol(token, '%')
      ) {
        return left;
      }
      this.advance();
      left = new ArithmeticValue(this.arithmetic(token), left, this.parseUnary());
    }
  }

  private parseUnary(): ValueExpression {
    if (this.isSymbol(this.peek(), '-')) {
      this.advance();
      return new NegatedValue(this.parseUnary());
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ValueExpression {
    const token = this.advance();

    switch (token.type) {
      case 'number':
      case 'string':
        return new LiteralValue(token.value);
      case 'name':
        return this.parseName(token.value, token.position);
      case 'symbol':
        if (token.value === '[') {
          return this.parseList();
        }
        if (token.value === '(') {
          const inner = this.parseSum();
          this.expectSymbol(')');
          return inner;
        }
        if (token.value === '=') {
          throw ConditionEvaluationError.unsupported('Assignment', token.position);
        }
        throw this.unexpected(token);
      case 'eof':
        throw ConditionEvaluationError.parse(
          'Unexpected end of condition',
          token.position,
        );
    }
  }

  private parseName(name: string, position: number): ValueExpression {
    if (Object.hasOwn(LITERAL_NAMES, name)) {
      return new LiteralValue(LITERAL_NAMES[name]);
    }
    if (RESERVED_NAMES.has(name)) {
      throw ConditionEvaluationError.parse(`Unexpected keyword '${name}'`, position);
    }

    const next = this.peek();
    if (this.isSymbol(next, '(')) {
      throw ConditionEvaluationError.unsupported('Function call', next.position);
    }
    if (this.isSymbol(next, '.')) {
      throw ConditionEvaluationError.unsupported('Member access', next.position);
    }
    if (this.isSymbol(next, '[')) {
      throw ConditionEvaluationError.unsupported('Indexing', next.position);
    }
    return new VariableReference(name);
  }

  private parseList(): ListValue {
    const items: ValueExpression[] = [];
    while (!this.isSymbol(this.peek(), ']')) {
      items.push(this.parseSum());
      if (!this.isSymbol(this.peek(), ',')) {
        break;
      }
      this.advance();
    }
    this.expectSymbol(']');
    return new ListValue(items);
  }

  private matchComparisonOperator(): ComparisonOperator | undefined {
    const token = this.peek();
    if (token.type === 'symbol' && COMPARISON_SYMBOLS.has(token.value)) {
      this.advance();
      return toComparisonOperator(token.value);
    }
    if (this.isName(token, 'in')) {
      this.advance();
      return 'in';
    }
    if (this.isName(token, 'not') && this.isName(this.peek(1), 'in')) {
      this.advance();
      this.advance();
      return 'not in';
    }
    return undefined;
  }

  private isComparisonStart(token: Token): boolean {
    return (
      (token.type === 'symbol' && COMPARISON_SYMBOLS.has(token.value)) ||
      this.isName(token, 'in') ||
      (this.isName(token, 'not') && this.isName(this.peek(1), 'in'))
    );
  }

  private continuesOperand(token: Token): boolean {
    return (
      this.isComparisonStart(token) ||
      (token.type === 'symbol' && ARITHMETIC_SYMBOLS.has(token.value))
    );
  }

  private matchKeyword(word: string, symbol: string): boolean {
    const token = this.peek();
    if (this.isName(token, word) && !(word === 'not' && this.isName(this.peek(1), 'in'))) {
      this.advance();
      return true;
    }
    if (this.isSymbol(token, symbol)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expectSymbol(symbol: string): void {
    const token = this.advance();
    if (!this.isSymbol(token, symbol)) {
      throw ConditionEvaluationError.parse(
        `Expected '${symbol}'`,
        token.position,
      );
    }
  }

  private arithmetic(token: Token): ArithmeticOperator {
    if (token.type === 'symbol') {
      switch (token.value) {
        case '+':
        case '-':
        case '*':
        case '/':
        case '%':
          return token.value;
      }
    }
    throw this.unexpected(token);
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'eof') {
      this.index += 1;
    }
    return token;
  }

  private isSymbol(token: Token, value: string): boolean {
    return token.type === 'symbol' && token.value === value;
  }

  private isName(token: Token, value: string): boolean {
    return token.type === 'name' && token.value === value;
  }

  private unexpected(token: Token): ConditionEvaluationError {
    if (token.type === 'eof') {
      return ConditionEvaluationError.parse('Unexpected end of condition', token.position);
    }
    return ConditionEvaluationError.parse(
      `Unexpected token '${String(token.value)}'`,
      token.position,
    );
  }
}

function toComparisonOperator(symbol: string): ComparisonOperator {
  switch (symbol) {
    case '==':
    case '!=':
    case '>':
    case '<':
    case '>=':
    case '<=':
      return symbol;
    default:
      throw new Error(`Not a comparison symbol: ${symbol}`);
  }
}
