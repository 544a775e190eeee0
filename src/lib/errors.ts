/**
 * Structured error classes for modelctl
 *
 * Configuration and command failures are thrown as ApplicationError subclasses;
 * per-record HTTP and Docker failures travel as Result<T> instead.
 */

import { types } from 'node:util';

/**
 * Error codes for standardized error handling
 */
export const ErrorCodes = {
  // Validation errors
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_PARSE_FAILED: 'CONFIG_PARSE_FAILED',
  CONFIG_EMPTY: 'CONFIG_EMPTY',
  UNRESOLVED_PLACEHOLDER: 'UNRESOLVED_PLACEHOLDER',
  DUPLICATE_MODEL_NAME: 'DUPLICATE_MODEL_NAME',

  // Command errors
  COMMAND_FAILED: 'COMMAND_FAILED',
  COMMAND_TIMEOUT: 'COMMAND_TIMEOUT',

  // Generic errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all modelctl errors
 */
export class ApplicationError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get a user-friendly error message
   */
  getUserMessage(): string {
    return `${this.message} (${this.code})`;
  }
}

/**
 * Configuration file or settings could not be used
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.CONFIG_INVALID,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'ConfigurationError';
  }
}

export interface Violation {
  field: string;
  message: string;
}

/**
 * One or more model records failed schema validation
 */
export class ValidationError extends ApplicationError {
  public readonly violations: Violation[];

  constructor(message: string, violations: Violation[] = [], details?: Record<string, unknown>) {
    super(message, ErrorCodes.VALIDATION_FAILED, { ...details, violations });
    this.name = 'ValidationError';
    this.violations = violations;
  }

  override getUserMessage(): string {
    if (this.violations.length === 0) {
      return super.getUserMessage();
    }
    const lines = this.violations.map((v) => `  • ${v.field}: ${v.message}`);
    return `${this.message} (${this.code})\n${lines.join('\n')}`;
  }
}

/**
 * External command exited non-zero or timed out
 */
export class CommandError extends ApplicationError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string,
    code: ErrorCode = ErrorCodes.COMMAND_FAILED,
  ) {
    super(message, code, { command, exitCode, stderr });
    this.name = 'CommandError';
  }
}

/**
 * Type guard to check if an error is an ApplicationError
 */
export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

/**
 * Message for any thrown value
 */
export function describeError(error: unknown): string {
  if (isApplicationError(error)) {
    return error.getUserMessage();
  }
  return types.isNativeError(error) ? error.message : String(error);
}
