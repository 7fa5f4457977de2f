/**
 * Error types and codes for context-ablation.
 * This is the error contract - all errors should extend AblationError.
 */

/**
 * Base error class for all context-ablation errors.
 */
export class AblationError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AblationError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration errors: unknown knob values, bad task suites, bad config files.
 * Raised before any trial is simulated.
 */
export class ConfigError extends AblationError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Malformed trial data (CSV cells that do not coerce, empty result files).
 */
export class ValidationError extends AblationError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends AblationError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Run configuration
  UNKNOWN_VALUE: 'C001',
  EMPTY_SELECTION: 'C002',
  INVALID_REPEATS: 'C003',
  INVALID_MAX_TASKS: 'C004',
  UNSUPPORTED_MODE: 'C005',
  INVALID_SEED: 'C006',
  NO_CANDIDATES: 'C007',
  CONFIG_LOAD_ERROR: 'C008',

  // Input data
  INVALID_TASK_SUITE: 'D001',
  INVALID_TASK: 'D002',
  INVALID_CSV: 'D003',

  // System
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
