/**
 * Domain errors for the contribution ledger and incentive engine.
 *
 * Every error carries a readonly `category` and `code` discriminant so callers
 * can tell a claim worth retrying later (timing) from one to abandon.
 */

export type ErrorCategory = 'validation' | 'permission' | 'timing' | 'economic' | 'arithmetic';

export type ValidationErrorCode =
  | 'NOT_FOUND'
  | 'MISMATCH'
  | 'KEY_COLLISION'
  | 'INVALID_INPUT'
  | 'INVALID_CONFIG';

export type PermissionErrorCode = 'UNAUTHORIZED';

export type TimingErrorCode = 'CLOCK_REGRESSION' | 'TOO_EARLY';

export type EconomicErrorCode =
  | 'INSUFFICIENT_PAYMENT'
  | 'NOTHING_TO_CLAIM'
  | 'ALREADY_CLAIMED'
  | 'NO_STANDING'
  | 'SELF_REPORT'
  | 'MODEL_AGREES'
  | 'MODEL_DISAGREES';

export type ArithmeticErrorCode = 'OVERFLOW' | 'UNDERFLOW' | 'DIVISION_BY_ZERO' | 'INSUFFICIENT_BALANCE';

export type IncentiveErrorCode =
  | ValidationErrorCode
  | PermissionErrorCode
  | TimingErrorCode
  | EconomicErrorCode
  | ArithmeticErrorCode;

export abstract class IncentiveError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly code: IncentiveErrorCode;

  constructor(
    message: string,
    public readonly details: Readonly<Record<string, unknown>> = {}
  ) {
    super(message);
  }
}

export class ValidationError extends IncentiveError {
  public readonly category = 'validation' as const;
  constructor(
    public readonly code: ValidationErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'ValidationError';
  }
}

export class PermissionError extends IncentiveError {
  public readonly category = 'permission' as const;
  public readonly code = 'UNAUTHORIZED' as const;
  constructor(
    public readonly caller: string,
    public readonly operation: string
  ) {
    super(`${caller} is not allowed to call ${operation}`, { caller, operation });
    this.name = 'PermissionError';
  }
}

export class TimingError extends IncentiveError {
  public readonly category = 'timing' as const;
  constructor(
    public readonly code: TimingErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'TimingError';
  }
}

export class EconomicError extends IncentiveError {
  public readonly category = 'economic' as const;
  constructor(
    public readonly code: EconomicErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'EconomicError';
  }
}

export class ArithmeticError extends IncentiveError {
  public readonly category = 'arithmetic' as const;
  constructor(
    public readonly code: ArithmeticErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'ArithmeticError';
  }
}

// Type guards

export function isIncentiveError(error: unknown): error is IncentiveError {
  return error instanceof IncentiveError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isPermissionError(error: unknown): error is PermissionError {
  return error instanceof PermissionError;
}

export function isTimingError(error: unknown): error is TimingError {
  return error instanceof TimingError;
}

export function isEconomicError(error: unknown): error is EconomicError {
  return error instanceof EconomicError;
}

export function isArithmeticError(error: unknown): error is ArithmeticError {
  return error instanceof ArithmeticError;
}

/**
 * Structured log fields for a failure, whatever was thrown
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (isIncentiveError(error)) {
    return { category: error.category, code: error.code, error: error.message };
  }
  return { error: error instanceof Error ? error.message : String(error) };
}
