/**
 * Wizard screen state definitions
 * @module @faultline/shared/types/screen
 */

/**
 * Wizard screen variants
 */
export type ScreenKind =
  | 'selecting'   // Experiment catalog, exists without a session
  | 'editing'     // Field list of the selected experiment
  | 'confirming'  // Rendered artifact and disruption warning
  | 'running'     // Live event stream
  | 'reporting';  // Final report and summary

/**
 * One step of the wizard
 */
export type ScreenState =
  | { readonly kind: 'selecting' }
  | { readonly kind: 'editing'; readonly fieldKey: string }
  | { readonly kind: 'confirming' }
  | { readonly kind: 'running' }
  | { readonly kind: 'reporting' };

/**
 * Screens that may follow each screen on a session's navigation stack.
 * `selecting` never enters a session stack.
 */
export const SCREEN_TRANSITIONS: Readonly<Record<ScreenKind, readonly ScreenKind[]>> = {
  selecting: [],
  editing: ['editing', 'confirming'],
  confirming: ['running'],
  running: ['reporting'],
  reporting: [],
};

/**
 * Screens that cannot be left through back-navigation
 */
export const TERMINAL_SCREENS: readonly ScreenKind[] = ['running', 'reporting'] as const;

/**
 * Screen constructors
 */
export const Screens = {
  selecting: (): ScreenState => ({ kind: 'selecting' }),
  editing: (fieldKey: string): ScreenState => ({ kind: 'editing', fieldKey }),
  confirming: (): ScreenState => ({ kind: 'confirming' }),
  running: (): ScreenState => ({ kind: 'running' }),
  reporting: (): ScreenState => ({ kind: 'reporting' }),
} as const;

/**
 * Check whether one screen may follow another
 */
export function canTransition(from: ScreenKind, to: ScreenKind): boolean {
  return SCREEN_TRANSITIONS[from].includes(to);
}

/**
 * Check whether back-navigation out of a screen is forbidden
 */
export function isTerminalScreen(screen: ScreenState): boolean {
  return TERMINAL_SCREENS.includes(screen.kind);
}

/**
 * Structural equality of two screen states
 */
export function isSameScreen(a: ScreenState, b: ScreenState): boolean {
  if (a.kind === 'editing' && b.kind === 'editing') {
    return a.fieldKey === b.fieldKey;
  }
  return a.kind === b.kind;
}

/**
 * Short label of a screen for logs
 */
export function describeScreen(screen: ScreenState): string {
  return screen.kind === 'editing' ? `editing(${screen.fieldKey})` : screen.kind;
}
