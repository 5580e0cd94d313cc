/**
 * Unit tests for error classes
 */

import { describe, it, expect } from 'vitest';

import {
  ErrorCode,
  ExecutionError,
  FaultlineError,
  NavigationError,
  PipelineStateError,
  SummaryUnavailableError,
  ValidationError,
  errorMessage,
  isExecutionError,
  isNavigationError,
  isValidationError,
  wrapError,
} from '../../src/index.js';

describe('FaultlineError', () => {
  it('should derive the category from the code', () => {
    expect(new FaultlineError('x', ErrorCode.INVALID_OPTION).category).toBe('validation');
    expect(new FaultlineError('x', ErrorCode.DUPLICATE_EXPERIMENT).category).toBe('catalog');
    expect(new FaultlineError('x', ErrorCode.NAVIGATION_LOCKED).category).toBe('navigation');
    expect(new FaultlineError('x', ErrorCode.EXECUTOR_EXITED).category).toBe('execution');
    expect(new FaultlineError('x', ErrorCode.SUMMARY_TIMEOUT).category).toBe('summary');
    expect(new FaultlineError('x').category).toBe('general');
  });

  it('should treat catalog and pipeline state errors as unrecoverable', () => {
    expect(new FaultlineError('x', ErrorCode.CATALOG_INVALID).isRecoverable()).toBe(false);
    expect(new PipelineStateError('run', 'idle').isRecoverable()).toBe(false);
    expect(NavigationError.locked('running').isRecoverable()).toBe(true);
  });

  it('should serialize with its correlation id', () => {
    const error = new FaultlineError('Broken', ErrorCode.INTERNAL, { part: 'renderer' }).withCorrelationId('session-1');
    const json = error.toJSON();

    expect(json).toMatchObject({
      error: {
        name: 'FaultlineError',
        code: ErrorCode.INTERNAL,
        message: 'Broken',
        meta: { part: 'renderer' },
        correlationId: 'session-1',
      },
    });
  });
});

describe('wrapError and errorMessage', () => {
  it('should keep faultline errors as they are', () => {
    const original = new FaultlineError('x', ErrorCode.TIMEOUT);

    expect(wrapError(original)).toBe(original);
  });

  it('should wrap other errors and values', () => {
    const cause = new Error('disk full');
    const wrapped = wrapError(cause, ErrorCode.INTERNAL);

    expect(wrapped.message).toBe('disk full');
    expect(wrapped.code).toBe(ErrorCode.INTERNAL);
    expect(wrapped.cause).toBe(cause);
    expect(wrapError('plain').message).toBe('plain');
  });

  it('should read the message of anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('ValidationError', () => {
  it('should describe an option outside the list', () => {
    const error = ValidationError.invalidOption('action', ['delay', 'loss'], 'drop');

    expect(error.message).toBe('Invalid option for field: action');
    expect(error.code).toBe(ErrorCode.INVALID_OPTION);
    expect(error.details).toEqual([
      { field: 'action', message: 'Expected one of delay, loss', rule: 'option', expected: 'one of delay, loss', received: 'drop' },
    ]);
    expect(isValidationError(error)).toBe(true);
  });

  it('should name every field of a combined error', () => {
    const error = ValidationError.multiple([
      { field: 'action', message: 'Expected one of delay, loss', rule: 'option' },
      { field: 'action', message: 'Again', rule: 'option' },
      { field: 'ghost', message: 'Field is not part of the schema', rule: 'schema' },
    ]);

    expect(error.message).toBe('Validation failed for fields: action, ghost');
    expect(error.getFieldErrors('action')).toHaveLength(2);
    expect(error.hasFieldError('duration')).toBe(false);
  });
});

describe('NavigationError', () => {
  it('should record the screens involved', () => {
    const error = NavigationError.illegalTransition('selecting', 'running');

    expect(error.message).toBe('Screen running cannot follow selecting');
    expect(error.code).toBe(ErrorCode.ILLEGAL_TRANSITION);
    expect(error.from).toBe('selecting');
    expect(error.to).toBe('running');
    expect(isNavigationError(error)).toBe(true);
  });

  it('should explain refused back-navigation', () => {
    expect(NavigationError.terminal('reporting').message).toBe('Cannot go back from the reporting screen');
    expect(NavigationError.locked('running').code).toBe(ErrorCode.NAVIGATION_LOCKED);
  });
});

describe('ExecutionError', () => {
  it('should describe an unsuccessful exit', () => {
    expect(ExecutionError.exited('kubectl', { exitCode: 1 }).message).toBe('kubectl exited with code 1');
    expect(ExecutionError.exited('kubectl', { exitCode: null, signal: 'SIGTERM' }).message)
      .toBe('kubectl was killed by SIGTERM');
    expect(ExecutionError.exited('kubectl', {}).message).toBe('kubectl exited with code unknown');
  });

  it('should wrap producer failures once', () => {
    const wrapped = ExecutionError.fromProducer(new Error('socket closed'), 'simulated');

    expect(wrapped.message).toBe('socket closed');
    expect(wrapped.executor).toBe('simulated');
    expect(ExecutionError.fromProducer(wrapped)).toBe(wrapped);
    expect(ExecutionError.fromProducer('plain').message).toBe('plain');
    expect(isExecutionError(wrapped)).toBe(true);
  });
});

describe('SummaryUnavailableError', () => {
  it('should describe a timeout', () => {
    const error = SummaryUnavailableError.timeout(5000);

    expect(error.message).toBe('Summarizer did not answer within 5000ms');
    expect(error.code).toBe(ErrorCode.SUMMARY_TIMEOUT);
  });
});
