import type { ZodError } from 'zod';

/**
 * Thrown when a persisted breakpoint dict cannot be restored.
 * @public
 */
export class BreakpointValidationError extends Error {
  public constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'BreakpointValidationError';
    Object.setPrototypeOf(this, BreakpointValidationError.prototype);
  }

  public static fromZodError(error: ZodError): BreakpointValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    );
    return new BreakpointValidationError(
      `Invalid breakpoint: ${issues.join('; ')}`,
      issues,
    );
  }
}
