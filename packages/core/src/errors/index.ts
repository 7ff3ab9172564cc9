import { LensErrorCode } from './codes.js';

// Re-export for consumers
export { LensErrorCode } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Serialized form of a {@link LensError}.
 */
export interface LensErrorJSON {
  error: string;
  code: LensErrorCode;
  severity: ErrorSeverity;
  recoverable: boolean;
  context?: Record<string, unknown>;
}

/**
 * Base error class for all SourceLens-specific errors.
 *
 * Malformed source text never produces one of these: parsers degrade instead.
 * They are reserved for broken caller contracts and invalid configuration.
 */
export class LensError extends Error {
  constructor(
    message: string,
    public readonly code: LensErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly severity: ErrorSeverity = 'medium',
    public readonly recoverable: boolean = true
  ) {
    super(message);
    this.name = 'LensError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): LensErrorJSON {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
    };
  }

  isRecoverable(): boolean {
    return this.recoverable;
  }
}

/**
 * A public operation was called with arguments that break its contract
 * (e.g. a non-string source).
 */
export class InvalidInputError extends LensError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, LensErrorCode.INVALID_INPUT, context, 'high', false);
    this.name = 'InvalidInputError';
  }
}

/**
 * Configuration overrides failed validation.
 */
export class ConfigError extends LensError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, LensErrorCode.CONFIG_INVALID, context, 'medium', true);
    this.name = 'ConfigError';
  }
}

/**
 * Type guard to check if an error is a LensError
 */
export function isLensError(error: unknown): error is LensError {
  return error instanceof LensError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
