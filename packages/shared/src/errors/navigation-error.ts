/**
 * Navigation error class
 * @module @faultline/shared/errors/navigation-error
 */

import { FaultlineError, ErrorCode, type ErrorMeta } from './base-error.js';
import type { ScreenKind } from '../types/screen.js';

/**
 * Error for a rejected push, pop or replace on the navigation stack.
 * Always recovered locally: the stack is left unchanged.
 */
export class NavigationError extends FaultlineError {
  /** Screen on top of the stack when the operation was rejected */
  public readonly from: ScreenKind;
  /** Requested screen, for push and replace */
  public readonly to?: ScreenKind;

  constructor(
    message: string,
    code: ErrorCode,
    from: ScreenKind,
    to?: ScreenKind,
    meta: ErrorMeta = {},
  ) {
    super(message, code, { ...meta, from, to });
    this.name = 'NavigationError';
    this.from = from;
    this.to = to;
  }

  /**
   * Create for back-navigation out of a running or reporting screen
   */
  static terminal(from: ScreenKind): NavigationError {
    return new NavigationError(
      `Cannot go back from the ${from} screen`,
      ErrorCode.NAVIGATION_REJECTED,
      from,
    );
  }

  /**
   * Create for back-navigation while an execution is in flight
   */
  static locked(from: ScreenKind): NavigationError {
    return new NavigationError(
      'Cannot go back while an experiment is running',
      ErrorCode.NAVIGATION_LOCKED,
      from,
    );
  }

  /**
   * Create for a transition missing from the transition table
   */
  static illegalTransition(from: ScreenKind, to: ScreenKind): NavigationError {
    return new NavigationError(
      `Screen ${to} cannot follow ${from}`,
      ErrorCode.ILLEGAL_TRANSITION,
      from,
      to,
    );
  }

  /**
   * Create for an operation that needs a session
   */
  static noSession(from: ScreenKind): NavigationError {
    return new NavigationError(
      'No experiment session is active',
      ErrorCode.NO_ACTIVE_SESSION,
      from,
    );
  }
}

/**
 * Check if an error is a NavigationError
 */
export function isNavigationError(error: unknown): error is NavigationError {
  return error instanceof NavigationError;
}
