/**
 * Error classes for faultline
 * @module @faultline/shared/errors
 */

// Base error
export {
  FaultlineError,
  ErrorCode,
  isFaultlineError,
  wrapError,
  errorMessage,
} from './base-error.js';

export type { ErrorMeta } from './base-error.js';

// Validation errors
export {
  ValidationError,
  isValidationError,
  validResult,
  invalidResult,
} from './validation-error.js';

export type {
  ValidationErrorDetail,
  ValidationResult,
} from './validation-error.js';

// Navigation errors
export {
  NavigationError,
  isNavigationError,
} from './navigation-error.js';

// Execution and summary errors
export {
  ExecutionError,
  SummaryUnavailableError,
  PipelineStateError,
  isExecutionError,
} from './execution-error.js';

export type { ExecutorFailureDetails } from './execution-error.js';
