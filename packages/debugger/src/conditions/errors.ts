/**
 * Failure categories of condition parsing and evaluation.
 */
export enum ConditionErrorCode {
  PARSE_ERROR = 'parse_error',
  UNSUPPORTED_CONSTRUCT = 'unsupported_construct',
  UNKNOWN_VARIABLE = 'unknown_variable',
  TYPE_MISMATCH = 'type_mismatch',
  DIVISION_BY_ZERO = 'division_by_zero',
}

/**
 * Raised when a breakpoint condition cannot be parsed or evaluated.
 *
 * The execution controller records these in the debug log and treats the
 * breakpoint as not matched.
 * @public
 */
export class ConditionEvaluationError extends Error {
  public readonly code: ConditionErrorCode;
  public readonly position?: number;

  public constructor(
    message: string,
    code: ConditionErrorCode,
    position?: number,
  ) {
    super(message);
    this.name = 'ConditionEvaluationError';
    this.code = code;
    this.position = position;
    Object.setPrototypeOf(this, ConditionEvaluationError.prototype);
  }

  public static parse(message: string, position: number): ConditionEvaluationError {
    return new ConditionEvaluationError(
      `${message} at position ${position}`,
      ConditionErrorCode.PARSE_ERROR,
      position,
    );
  }

  public static unsupported(
    construct: string,
    position: number,
  ): ConditionEvaluationError {
    return new ConditionEvaluationError(
      `${construct} is not allowed in conditions (position ${position})`,
      ConditionErrorCode.UNSUPPORTED_CONSTRUCT,
      position,
    );
  }

  public static unknownVariable(name: string): ConditionEvaluationError {
    return new ConditionEvaluationError(
      `Unknown variable '${name}'`,
      ConditionErrorCode.UNKNOWN_VARIABLE,
    );
  }

  public static typeMismatch(
    operator: string,
    left: unknown,
    right: unknown,
  ): ConditionEvaluationError {
    return new ConditionEvaluationError(
      `Operator '${operator}' cannot be applied to ${describeType(left)} and ${describeType(right)}`,
      ConditionErrorCode.TYPE_MISMATCH,
    );
  }

  public static divisionByZero(): ConditionEvaluationError {
    return new ConditionEvaluationError(
      'Division by zero',
      ConditionErrorCode.DIVISION_BY_ZERO,
    );
  }
}

export function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'list';
  }
  return typeof value;
}
