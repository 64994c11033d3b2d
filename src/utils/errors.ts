/**
 * Error Handling Utilities
 *
 * Typed application errors for the rewards ledger. Every error the core
 * throws on purpose is an AppError carrying a machine-readable code and the
 * HTTP status the API layer should answer with.
 *
 * Families:
 * - ValidationError         malformed input
 * - UnauthenticatedError    caller identity header missing
 * - NotFoundError           unknown code / option / redemption / customer
 * - BusinessRuleViolation   referral, balance and redemption lifecycle rules
 * - ResourceExhaustedError  referral code space exhausted
 * - DependencyFailureError  notification or repair-tracker call failed
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

// =============================================================================
// Validation
// =============================================================================

export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', 400, field ? { field } : undefined);
    this.field = field;
  }
}

// =============================================================================
// Identity
// =============================================================================

/**
 * Caller identity missing. Identity itself is asserted by the upstream gateway.
 */
export class UnauthenticatedError extends AppError {
  constructor(message: string) {
    super(message, 'UNAUTHENTICATED', 401);
  }
}

// =============================================================================
// Not Found
// =============================================================================

export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string, identifier?: string | number) {
    const message = identifier !== undefined
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
    this.resource = resource;
  }
}

/**
 * Reward option missing, or present but inactive (inactive options are not offered)
 */
export class UnknownOptionError extends NotFoundError {
  constructor(rewardOptionId: number) {
    super('Reward option', rewardOptionId);
  }
}

// =============================================================================
// Business Rules
// =============================================================================

export type BusinessRule =
  | 'SELF_REFERRAL'
  | 'DUPLICATE_REFERRAL'
  | 'INSUFFICIENT_POINTS'
  | 'INVALID_TRANSITION'
  | 'NOT_ASSIGNED_TECHNICIAN'
  | 'REDEMPTION_NOT_FULFILLED'
  | 'DISCOUNT_ALREADY_APPLIED';

export class BusinessRuleViolation extends AppError {
  public readonly rule: BusinessRule;

  constructor(rule: BusinessRule, message: string, statusCode: number = 422, details?: Record<string, unknown>) {
    super(message, rule, statusCode, details);
    this.rule = rule;
  }
}

export class SelfReferralError extends BusinessRuleViolation {
  constructor() {
    super('SELF_REFERRAL', 'Cannot use your own referral code');
  }
}

export class DuplicateReferralError extends BusinessRuleViolation {
  constructor(code: string) {
    super('DUPLICATE_REFERRAL', `Referral code ${code} has already been used by this customer`, 409);
  }
}

export class InsufficientPointsError extends BusinessRuleViolation {
  public readonly required: number;
  public readonly available: number;

  constructor(required: number, available: number) {
    super(
      'INSUFFICIENT_POINTS',
      `Not enough points. You need ${required}, but have ${available}.`,
      422,
      { required, available },
    );
    this.required = required;
    this.available = available;
  }
}

export class InvalidTransitionError extends BusinessRuleViolation {
  public readonly from: string;
  public readonly to: string;

  constructor(redemptionId: string, from: string, to: string) {
    super('INVALID_TRANSITION', `Redemption ${redemptionId} cannot move from ${from} to ${to}`, 409, { from, to });
    this.from = from;
    this.to = to;
  }
}

export class NotAssignedTechnicianError extends BusinessRuleViolation {
  constructor(redemptionId: string, technicianId: string) {
    super('NOT_ASSIGNED_TECHNICIAN', `Redemption ${redemptionId} is not assigned to technician ${technicianId}`, 403);
  }
}

export class RedemptionNotFulfilledError extends BusinessRuleViolation {
  constructor(redemptionId: string, status: string) {
    super('REDEMPTION_NOT_FULFILLED', `Redemption ${redemptionId} is ${status}; only fulfilled redemptions can be applied`, 409, { status });
  }
}

export class DiscountAlreadyAppliedError extends BusinessRuleViolation {
  constructor(message: string) {
    super('DISCOUNT_ALREADY_APPLIED', message, 409);
  }
}

// =============================================================================
// Resources & Dependencies
// =============================================================================

export class ResourceExhaustedError extends AppError {
  constructor(message: string, code: string = 'RESOURCE_EXHAUSTED') {
    super(message, code, 503);
  }
}

export class ExhaustedRetriesError extends ResourceExhaustedError {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(`Failed to generate unique referral code after ${attempts} attempts`, 'EXHAUSTED_RETRIES');
    this.attempts = attempts;
  }
}

export class DependencyFailureError extends AppError {
  public readonly dependency: string;

  constructor(dependency: string, message: string) {
    super(`${dependency}: ${message}`, 'DEPENDENCY_FAILURE', 502);
    this.dependency = dependency;
  }
}

/**
 * Extract a loggable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
