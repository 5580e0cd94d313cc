/**
 * Base error class with error codes
 * @module @faultline/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  NOT_IMPLEMENTED = 1002,
  TIMEOUT = 1003,
  CANCELLED = 1004,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  INVALID_OPTION = 2004,
  INVALID_CHARACTERS = 2005,
  UNKNOWN_FIELD = 2006,
  CONSTRAINT_VIOLATION = 2007,

  // Catalog errors (3xxx)
  CATALOG_INVALID = 3000,
  EXPERIMENT_NOT_FOUND = 3001,
  DUPLICATE_FIELD_KEY = 3002,
  DUPLICATE_EXPERIMENT = 3003,

  // Navigation errors (4xxx)
  NAVIGATION_REJECTED = 4000,
  NAVIGATION_LOCKED = 4001,
  ILLEGAL_TRANSITION = 4002,
  NO_ACTIVE_SESSION = 4003,

  // Execution errors (5xxx)
  EXECUTION_FAILED = 5000,
  EXECUTOR_EXITED = 5001,
  PIPELINE_STATE = 5002,

  // Summary errors (6xxx)
  SUMMARY_UNAVAILABLE = 6000,
  SUMMARY_TIMEOUT = 6001,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Experiment involved */
  experimentId?: string;
  /** Session involved */
  sessionId?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all faultline errors
 */
export class FaultlineError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Correlation ID for tracing */
  public correlationId?: string;
  /** Original error if this wraps another */
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'FaultlineError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Code category (thousands digit)
   */
  get category(): 'general' | 'validation' | 'catalog' | 'navigation' | 'execution' | 'summary' {
    switch (Math.floor(this.code / 1000)) {
      case 2:
        return 'validation';
      case 3:
        return 'catalog';
      case 4:
        return 'navigation';
      case 5:
        return 'execution';
      case 6:
        return 'summary';
      default:
        return 'general';
    }
  }

  /**
   * Whether the wizard can carry on after this error
   */
  isRecoverable(): boolean {
    return this.category !== 'catalog' && this.code !== ErrorCode.PIPELINE_STATE;
  }

  /**
   * Set correlation ID for tracing
   */
  withCorrelationId(correlationId: string): this {
    this.correlationId = correlationId;
    return this;
  }

  /**
   * Convert to JSON for machine-readable output
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }

  /**
   * Convert to log-friendly format
   */
  toLog(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
      correlationId: this.correlationId,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

/**
 * Check if an error is a FaultlineError
 */
export function isFaultlineError(error: unknown): error is FaultlineError {
  return error instanceof FaultlineError;
}

/**
 * Wrap an unknown error as a FaultlineError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): FaultlineError {
  if (isFaultlineError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new FaultlineError(error.message, code, {}, error);
  }

  return new FaultlineError(String(error), code);
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
