/**
 * Validation error class
 * @module @faultline/shared/errors/validation-error
 */

import { FaultlineError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Validation error detail
 */
export interface ValidationErrorDetail {
  /** Field that failed validation */
  field: string;
  /** Error message */
  message: string;
  /** Validation rule that failed */
  rule?: string;
  /** Expected value/format */
  expected?: string;
  /** Actual value received */
  received?: unknown;
}

/**
 * Validation error for bad field input and invalid catalog entries
 */
export class ValidationError extends FaultlineError {
  /** Validation error details */
  public readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    details: ValidationErrorDetail[] = [],
    meta: ErrorMeta = {},
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
  ) {
    super(message, code, meta);
    this.name = 'ValidationError';
    this.details = details;
  }

  /**
   * Create from a single field error
   */
  static field(
    field: string,
    message: string,
    rule?: string,
  ): ValidationError {
    return new ValidationError(`Validation failed for field: ${field}`, [
      { field, message, rule },
    ], { field });
  }

  /**
   * Create for a required field
   */
  static required(field: string): ValidationError {
    return new ValidationError(`Missing required field: ${field}`, [
      { field, message: 'This field is required', rule: 'required' },
    ], { field }, ErrorCode.MISSING_REQUIRED_FIELD);
  }

  /**
   * Create for an enumerated value outside its options
   */
  static invalidOption(
    field: string,
    options: readonly string[],
    received: string,
  ): ValidationError {
    const expected = `one of ${options.join(', ')}`;
    return new ValidationError(`Invalid option for field: ${field}`, [
      { field, message: `Expected ${expected}`, rule: 'option', expected, received },
    ], { field }, ErrorCode.INVALID_OPTION);
  }

  /**
   * Create for input containing control characters
   */
  static invalidCharacters(field: string, received: string): ValidationError {
    return new ValidationError(`Invalid characters in field: ${field}`, [
      { field, message: 'Control characters are not allowed', rule: 'characters', received },
    ], { field }, ErrorCode.INVALID_CHARACTERS);
  }

  /**
   * Create for a key that is not in the schema
   */
  static unknownField(field: string): ValidationError {
    return new ValidationError(`Unknown field: ${field}`, [
      { field, message: 'Field is not part of the schema', rule: 'schema' },
    ], { field }, ErrorCode.UNKNOWN_FIELD);
  }

  /**
   * Create for an invalid format
   */
  static invalidFormat(
    field: string,
    expected: string,
    received?: unknown,
  ): ValidationError {
    return new ValidationError(`Invalid format for field: ${field}`, [
      { field, message: `Expected ${expected}`, rule: 'format', expected, received },
    ], { field }, ErrorCode.INVALID_FORMAT);
  }

  /**
   * Create from multiple field errors
   */
  static multiple(errors: ValidationErrorDetail[], code: ErrorCode = ErrorCode.VALIDATION_FAILED): ValidationError {
    const fieldNames = [...new Set(errors.map(e => e.field))].join(', ');
    return new ValidationError(
      `Validation failed for fields: ${fieldNames}`,
      errors,
      {},
      code,
    );
  }

  /**
   * Add a validation error detail
   */
  addDetail(detail: ValidationErrorDetail): this {
    this.details.push(detail);
    return this;
  }

  /**
   * Check if a specific field has an error
   */
  hasFieldError(field: string): boolean {
    return this.details.some(d => d.field === field);
  }

  /**
   * Get errors for a specific field
   */
  getFieldErrors(field: string): ValidationErrorDetail[] {
    return this.details.filter(d => d.field === field);
  }

  /**
   * Convert to JSON for machine-readable output
   */
  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        details: this.details,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: ValidationError };

/**
 * Create a successful validation result
 */
export function validResult<T>(value: T): ValidationResult<T> {
  return { valid: true, value };
}

/**
 * Create a failed validation result
 */
export function invalidResult<T>(error: ValidationError): ValidationResult<T> {
  return { valid: false, error };
}
