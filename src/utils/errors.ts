/**
 * Error types and codes for Strata.
 * All errors raised by the analyzer extend StrataError.
 */

/**
 * Base error class for all Strata errors.
 */
export class StrataError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StrataError';
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
 * Configuration errors (loading, schema validation, policy compilation).
 * Always raised before any source file is read.
 */
export class ConfigError extends StrataError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable files, YAML parse failures).
 */
export class SystemError extends StrataError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Broken internal invariant. Always aborts the run with `internal-error`.
 */
export class InvariantError extends StrataError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InvariantError';
  }
}

/**
 * The run deadline passed.
 */
export class DeadlineError extends StrataError {
  constructor(
    public readonly phase: 'ingestion' | 'evaluation',
    elapsedMs: number
  ) {
    super(ErrorCodes.DEADLINE_EXCEEDED, `Deadline exceeded during ${phase} after ${elapsedMs}ms`, {
      phase,
      elapsedMs,
    });
    this.name = 'DeadlineError';
  }
}

export const ErrorCodes = {
  // Configuration errors (C001-C008)
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_SCHEMA: 'C002',
  INVALID_GLOB: 'C003',
  INVALID_REGEX: 'C004',
  UNKNOWN_LAYER: 'C005',
  DUPLICATE_LAYER: 'C006',
  CYCLIC_LAYER_POLICY: 'C007',
  INVALID_ALIAS: 'C008',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  READ_ERROR: 'S002',

  // Internal invariants (X001-X004)
  DANGLING_EDGE: 'X001',
  SELF_EDGE: 'X002',
  MALFORMED_VIOLATION: 'X003',
  UNEXPECTED: 'X004',

  // Run control
  DEADLINE_EXCEEDED: 'T001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
