/**
 * Navigation stack controller
 * Push/pop/replace over a session's screen history
 * @module @faultline/core/services/navigation-stack
 */

import { shallowReactive } from '@vue/reactivity';
import type { ScreenState } from '@faultline/shared';
import {
  NavigationError,
  canTransition,
  describeScreen,
  isTerminalScreen,
  createServiceLogger,
  type Logger,
} from '@faultline/shared';

/**
 * Result of a push or replace
 */
export type NavigationResult =
  | { ok: true; top: ScreenState }
  | { ok: false; error: NavigationError };

/**
 * Result of a pop. `exited` is set when the stack held a single screen:
 * nothing was removed and the caller should end the session.
 */
export type PopResult =
  | { ok: true; exited: boolean; top: ScreenState }
  | { ok: false; error: NavigationError };

/**
 * Navigation stack options
 */
export interface NavigationStackOptions {
  /** Returns true while back-navigation must be refused (pipeline running) */
  isLocked?: () => boolean;
  /** Logger */
  logger?: Logger;
}

/**
 * Screen history of one session. Never empty; the bottom screen is the
 * session's entry screen and `selecting` is never on it.
 */
export class NavigationStack {
  private readonly stack: ScreenState[];
  private readonly isLocked: () => boolean;
  private readonly logger: Logger;

  constructor(initial: ScreenState, options: NavigationStackOptions = {}) {
    if (initial.kind === 'selecting') {
      throw NavigationError.illegalTransition('selecting', 'selecting');
    }
    this.stack = shallowReactive<ScreenState[]>([initial]);
    this.isLocked = options.isLocked ?? (() => false);
    this.logger = options.logger ?? createServiceLogger({ component: 'navigation-stack' });
  }

  /**
   * Screen on top of the stack
   */
  peek(): ScreenState {
    const top = this.stack[this.stack.length - 1];
    if (!top) {
      // Unreachable: every mutation keeps at least one screen
      throw NavigationError.noSession('selecting');
    }
    return top;
  }

  /**
   * Number of screens on the stack
   */
  get depth(): number {
    return this.stack.length;
  }

  /**
   * Copy of the stack, bottom first
   */
  snapshot(): ScreenState[] {
    return [...this.stack];
  }

  /**
   * Append a screen, keeping every ancestor
   */
  push(state: ScreenState): NavigationResult {
    const top = this.peek();
    if (!canTransition(top.kind, state.kind)) {
      return this.reject(NavigationError.illegalTransition(top.kind, state.kind));
    }
    this.stack.push(state);
    this.logger.debug('Pushed screen', { from: describeScreen(top), to: describeScreen(state) });
    return { ok: true, top: state };
  }

  /**
   * Remove the top screen and return to the previous one
   */
  pop(): PopResult {
    const top = this.peek();
    if (isTerminalScreen(top)) {
      return this.reject(NavigationError.terminal(top.kind));
    }
    if (this.isLocked()) {
      return this.reject(NavigationError.locked(top.kind));
    }
    if (this.stack.length === 1) {
      this.logger.debug('Pop on entry screen, session exit requested', { screen: describeScreen(top) });
      return { ok: true, exited: true, top };
    }
    this.stack.pop();
    const previous = this.peek();
    this.logger.debug('Popped screen', { from: describeScreen(top), to: describeScreen(previous) });
    return { ok: true, exited: false, top: previous };
  }

  /**
   * Swap the top screen for another in one step, so the replaced screen
   * cannot be revisited through back-navigation
   */
  replace(state: ScreenState): NavigationResult {
    const top = this.peek();
    if (!canTransition(top.kind, state.kind)) {
      return this.reject(NavigationError.illegalTransition(top.kind, state.kind));
    }
    this.stack.splice(this.stack.length - 1, 1, state);
    this.logger.debug('Replaced screen', { from: describeScreen(top), to: describeScreen(state) });
    return { ok: true, top: state };
  }

  private reject(error: NavigationError): { ok: false; error: NavigationError } {
    this.logger.debug('Navigation rejected', { reason: error.message, code: error.code });
    return { ok: false, error };
  }
}
