/**
 * Execution and summary error classes
 * @module @faultline/shared/errors/execution-error
 */

import { FaultlineError, ErrorCode, errorMessage, type ErrorMeta } from './base-error.js';
import type { PipelinePhase } from '../types/execution.js';

/**
 * Executor failure details
 */
export interface ExecutorFailureDetails {
  /** Exit code if the executor is a process */
  exitCode?: number | null;
  /** Signal that ended the process */
  signal?: string | null;
  /** Last error output */
  stderr?: string;
}

/**
 * Producer failure during a run. Recorded as one terminal error event.
 */
export class ExecutionError extends FaultlineError {
  /** Executor name */
  public readonly executor?: string;
  /** Failure details */
  public readonly details: ExecutorFailureDetails;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.EXECUTION_FAILED,
    details: ExecutorFailureDetails = {},
    executor?: string,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message, code, { ...meta, executor, ...details }, cause);
    this.name = 'ExecutionError';
    this.executor = executor;
    this.details = details;
  }

  /**
   * Create for a process that exited unsuccessfully
   */
  static exited(executor: string, details: ExecutorFailureDetails): ExecutionError {
    const how = details.signal
      ? `was killed by ${details.signal}`
      : `exited with code ${details.exitCode ?? 'unknown'}`;
    return new ExecutionError(
      `${executor} ${how}`,
      ErrorCode.EXECUTOR_EXITED,
      details,
      executor,
    );
  }

  /**
   * Wrap whatever the producer threw
   */
  static fromProducer(error: unknown, executor?: string): ExecutionError {
    if (error instanceof ExecutionError) {
      return error;
    }
    return new ExecutionError(
      errorMessage(error),
      ErrorCode.EXECUTION_FAILED,
      {},
      executor,
      {},
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * External summarizer failure. Degrades to a placeholder, never blocks a report.
 */
export class SummaryUnavailableError extends FaultlineError {
  constructor(message: string, code: ErrorCode = ErrorCode.SUMMARY_UNAVAILABLE, cause?: Error) {
    super(message, code, {}, cause);
    this.name = 'SummaryUnavailableError';
  }

  /**
   * Create for a summarizer that did not answer in time
   */
  static timeout(timeoutMs: number): SummaryUnavailableError {
    return new SummaryUnavailableError(
      `Summarizer did not answer within ${timeoutMs}ms`,
      ErrorCode.SUMMARY_TIMEOUT,
    );
  }
}

/**
 * Illegal pipeline transition requested by the caller
 */
export class PipelineStateError extends FaultlineError {
  /** Phase the pipeline was in */
  public readonly phase: PipelinePhase;
  /** Operation that was attempted */
  public readonly operation: string;

  constructor(operation: string, phase: PipelinePhase) {
    super(
      `Cannot ${operation} while the pipeline is ${phase}`,
      ErrorCode.PIPELINE_STATE,
      { operation, phase },
    );
    this.name = 'PipelineStateError';
    this.phase = phase;
    this.operation = operation;
  }
}

/**
 * Check if an error is an ExecutionError
 */
export function isExecutionError(error: unknown): error is ExecutionError {
  return error instanceof ExecutionError;
}
