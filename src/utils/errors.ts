import { Request, Response, NextFunction } from 'express';
import logger from './logger';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request - validation errors.
 * `field` is the path of the offending value, e.g. `alertRules.rules[2].threshold`.
 */
export class ValidationError extends AppError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 400);
    this.field = field;
  }
}

/**
 * 404 Not Found - resource not found
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string) {
    super(`${resource} not found`, 404);
    this.resource = resource;
  }
}

/**
 * 409 Conflict - the resource is not in a state that allows the operation
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * A rule/action-group document that failed validation. The whole document is
 * rejected; `issues` lists every problem found.
 */
export class ConfigError extends AppError {
  public readonly issues: ValidationError[];

  constructor(issues: ValidationError[]) {
    super(`Configuration rejected with ${issues.length} issue(s)`, 400);
    this.issues = issues;
  }
}

export type EvaluationFailureReason = 'unavailable' | 'timeout' | 'malformed';

/**
 * Telemetry pull failed. Never the same thing as a clear.
 */
export class EvaluationError extends AppError {
  public readonly reason: EvaluationFailureReason;

  constructor(message: string, reason: EvaluationFailureReason = 'unavailable') {
    super(message, 502);
    this.reason = reason;
  }
}

/**
 * A delivery collaborator could not hand a notification to its receiver.
 * Non-transient failures are not retried.
 */
export class DeliveryError extends AppError {
  public readonly transient: boolean;

  constructor(message: string, transient = true) {
    super(message, 502);
    this.transient = transient;
  }
}

/**
 * A second concurrent Firing instance was about to be minted for one rule.
 * Programming error: never caught by the engine.
 */
export class DedupViolationError extends AppError {
  public readonly ruleId: string;

  constructor(ruleId: string, message: string) {
    super(`Dedup violation for rule ${ruleId}: ${message}`, 500, false);
    this.ruleId = ruleId;
  }
}

/**
 * Standard error response shape
 */
export interface ErrorResponse {
  error: string;
  field?: string;
  issues?: Array<{ field?: string; message: string }>;
}

/**
 * Format an error for JSON response.
 * Operational AppErrors expose their message; anything else gets a generic one.
 */
export function formatError(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return {
      error: error.message,
      ...(error.field && { field: error.field }),
    };
  }

  if (error instanceof ConfigError) {
    return {
      error: error.message,
      issues: error.issues.map(issue => ({ field: issue.field, message: issue.message })),
    };
  }

  if (error instanceof AppError && error.isOperational) {
    return { error: error.message };
  }

  return { error: 'Internal server error' };
}

/**
 * Get status code from error
 */
export function getErrorStatusCode(error: unknown): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }
  return 500;
}

/**
 * Express error handling middleware
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = getErrorStatusCode(error);
  const response = formatError(error);

  if (statusCode >= 500) {
    logger.error({ err: error, method: req.method, path: req.path }, 'request failed');
  }

  res.status(statusCode).json(response);
}

/**
 * Send a standardized error response. Logs server errors and returns a
 * sanitized body to the client.
 */
export function sendErrorResponse(
  res: Response,
  error: unknown,
  context: string,
): void {
  const statusCode = getErrorStatusCode(error);
  if (statusCode >= 500) {
    logger.error({ err: error }, `error ${context}`);
  }
  res.status(statusCode).json(formatError(error));
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
