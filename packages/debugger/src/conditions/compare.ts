import type { ComparisonOperator } from '@flowscope/models';
import { ConditionEvaluationError } from './errors.js';

/**
 * Structural equality for the value shapes flow variables hold: primitives,
 * lists and plain records.
 */
export function valuesEqual(left: unknown, right: unknown): boolean {
  if (left === right) {
    return true;
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return (
      left.length === right.length &&
      left.every((item, index) => valuesEqual(item, right[index]))
    );
  }
  if (isRecord(left) && isRecord(right)) {
    const leftKeys = Object.keys(left);
    const rightKeys = Object.keys(right);
    return (
      leftKeys.length === rightKeys.length &&
      leftKeys.every(
        (key) => Object.hasOwn(right, key) && valuesEqual(left[key], right[key]),
      )
    );
  }
  return false;
}

/**
 * Applies a comparison operator.
 *
 * Ordering needs two numbers or two strings. Membership looks the left
 * value up in a list, a string (substring) or a record (key).
 * @throws {ConditionEvaluationError} On operands the operator does not accept
 */
export function compareValues(
  operator: ComparisonOperator,
  left: unknown,
  right: unknown,
): boolean {
  switch (operator) {
    case '==':
      return valuesEqual(left, right);
    case '!=':
      return !valuesEqual(left, right);
    case '>':
    case '<':
    case '>=':
    case '<=':
      return compareOrdered(operator, left, right);
    case 'in':
      return contains(right, left, operator);
    case 'not in':
      return !contains(right, left, operator);
    default: {
      const unreachable: never = operator;
      throw new Error(`Unhandled operator ${String(unreachable)}`);
    }
  }
}

/**
 * Brings a configured comparison value to the type of the live value.
 *
 * Breakpoints restored from their persisted form hold strings, so `"10"`
 * must compare as a number against a numeric variable, and `"[1, 2]"` as a
 * list for membership tests.
 */
export function coerceToMatch(
  expected: unknown,
  current: unknown,
  operator: ComparisonOperator,
): unknown {
  if (typeof expected !== 'string') {
    return expected;
  }

  if (operator === 'in' || operator === 'not in') {
    return parseJsonList(expected) ?? expected;
  }

  const trimmed = expected.trim();
  if (typeof current === 'number' && trimmed !== '') {
    const numeric = Number(trimmed);
    return Number.isNaN(numeric) ? expected : numeric;
  }
  if (typeof current === 'boolean') {
    const lowered = trimmed.toLowerCase();
    if (lowered === 'true' || lowered === 'false') {
      return lowered === 'true';
    }
  }
  return expected;
}

function compareOrdered(
  operator: '>' | '<' | '>=' | '<=',
  left: unknown,
  right: unknown,
): boolean {
  if (typeof left === 'number' && typeof right === 'number') {
    return ordered(operator, left, right);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return ordered(operator, left, right);
  }
  throw ConditionEvaluationError.typeMismatch(operator, left, right);
}

function ordered<T extends number | string>(
  operator: '>' | '<' | '>=' | '<=',
  a: T,
  b: T,
): boolean {
  switch (operator) {
    case '>':
      return a > b;
    case '<':
      return a < b;
    case '>=':
      return a >= b;
    case '<=':
      return a <= b;
  }
}

function contains(
  container: unknown,
  item: unknown,
  operator: 'in' | 'not in',
): boolean {
  if (Array.isArray(container)) {
    return container.some((candidate) => valuesEqual(candidate, item));
  }
  if (typeof container === 'string' && typeof item === 'string') {
    return container.includes(item);
  }
  if (isRecord(container) && typeof item === 'string') {
    return Object.hasOwn(container, item);
  }
  throw ConditionEvaluationError.typeMismatch(operator, item, container);
}

function parseJsonList(text: string): unknown[] | undefined {
  const trimmed = text.trim();
  if (!trimmed.startsWith('[')) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return Array.isArray(parsed) ? parsed : undefined;
  } catch {
    // Not JSON: compare against the raw text
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
