/**
 * Error Types for disk-source
 *
 * Custom error classes with error codes for structured error handling.
 * Validation errors reject a configuration unit; system errors carry the
 * underlying cause.
 */

/**
 * Error codes for all disk-source errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'INVALID_COOKIE'
  | 'DUPLICATE_COOKIE'
  | 'TARGET_MISMATCH'
  | 'INVALID_AUTH'
  | 'INVALID_RESERVATION'
  | 'INVALID_ENCRYPTION'
  | 'DUPLICATE_SECLABEL'
  | 'SYMLINK_LOOP'
  | 'RESOLVER_FAILED'
  | 'CHAIN_LOOP'
  | 'KEY_LOOKUP_FAILED';

/**
 * Codes reported for malformed input
 */
export type ValidationErrorCode =
  | 'INVALID_COOKIE'
  | 'DUPLICATE_COOKIE'
  | 'TARGET_MISMATCH'
  | 'INVALID_AUTH'
  | 'INVALID_RESERVATION'
  | 'INVALID_ENCRYPTION'
  | 'DUPLICATE_SECLABEL';

/**
 * Codes reported for failures outside the caller's input
 */
export type SystemErrorCode =
  | 'SYMLINK_LOOP'
  | 'RESOLVER_FAILED'
  | 'CHAIN_LOOP'
  | 'KEY_LOOKUP_FAILED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  INVALID_COOKIE: 1,
  DUPLICATE_COOKIE: 1,
  TARGET_MISMATCH: 1,
  INVALID_AUTH: 1,
  INVALID_RESERVATION: 1,
  INVALID_ENCRYPTION: 1,
  DUPLICATE_SECLABEL: 1,
  SYMLINK_LOOP: 2,
  RESOLVER_FAILED: 2,
  CHAIN_LOOP: 2,
  KEY_LOOKUP_FAILED: 2,
};

/**
 * Base error class for all disk-source errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class DiskSourceError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'DiskSourceError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, DiskSourceError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for configuration-related issues.
 */
export class ConfigError extends DiskSourceError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Error for malformed storage source input (cookies, auth, reservations,
 * backing store references).
 */
export class ValidationError extends DiskSourceError {
  constructor(
    message: string,
    code: ValidationErrorCode,
    suggestion?: string
  ) {
    super(message, code, suggestion);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error for resolver failures, symlink and chain loops, and helper
 * process failures.
 */
export class SystemError extends DiskSourceError {
  public override readonly cause?: unknown;

  constructor(
    message: string,
    code: SystemErrorCode,
    cause?: unknown,
    public readonly path?: string
  ) {
    super(message, code);
    this.name = 'SystemError';
    this.cause = cause;
    Object.setPrototypeOf(this, SystemError.prototype);
  }
}

/**
 * Check if an error is a DiskSourceError.
 */
export function isDiskSourceError(error: unknown): error is DiskSourceError {
  return error instanceof DiskSourceError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isDiskSourceError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
