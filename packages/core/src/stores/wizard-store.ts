/**
 * Reactive wizard state store using Vue reactivity
 * @module @faultline/core/stores/wizard-store
 */

import { computed, shallowReactive, type ComputedRef } from '@vue/reactivity';
import type {
  ExecutionEvent,
  ExperimentDefinition,
  FieldSpec,
  PipelinePhase,
  Report,
  ScreenState,
} from '@faultline/shared';
import { Screens, findField, isTerminalScreen } from '@faultline/shared';
import type { ExperimentCatalog } from '../models/experiment-catalog.js';
import type { WizardSession } from '../models/session.js';

/**
 * Wizard state interface
 */
export interface WizardState {
  /** Loaded experiments */
  catalog: ExperimentCatalog;
  /** Highlighted row on the catalog screen */
  catalogIndex: number;
  /** Active session, null on the catalog screen */
  session: WizardSession | null;
  /** Pipeline phase of the active session */
  phase: PipelinePhase;
  /** Events of the current run, appended as they arrive */
  events: ExecutionEvent[];
  /** Artifact shown on the confirmation screen */
  artifact: string | null;
  /** Report of the completed run */
  report: Report | null;
  /** One-line message for the operator (rejected edit or navigation) */
  notice: string | null;
  /** Set once the operator asked to leave */
  quitRequested: boolean;
}

/**
 * Reactive wizard store
 */
export interface WizardStore {
  state: WizardState;
  /** Screen on top of the session stack, or the catalog */
  screen: ComputedRef<ScreenState>;
  highlightedExperiment: ComputedRef<ExperimentDefinition | undefined>;
  /** Field under the cursor on the editing screen */
  selectedField: ComputedRef<FieldSpec | undefined>;
  /** Whether a back command would be accepted */
  canGoBack: ComputedRef<boolean>;
}

/**
 * Fresh, reactive event list
 */
export function createEventLog(): ExecutionEvent[] {
  return shallowReactive<ExecutionEvent[]>([]);
}

/**
 * Create the reactive wizard state
 */
function createWizardState(catalog: ExperimentCatalog): WizardState {
  // Shallow: sessions and the catalog keep their own reactivity
  return shallowReactive<WizardState>({
    catalog,
    catalogIndex: 0,
    session: null,
    phase: 'idle',
    events: createEventLog(),
    artifact: null,
    report: null,
    notice: null,
    quitRequested: false,
  });
}

/**
 * Create a wizard store over a catalog
 */
export function createWizardStore(catalog: ExperimentCatalog): WizardStore {
  const state = createWizardState(catalog);

  // ============================================================================
  // Computed Properties
  // ============================================================================

  const screen = computed<ScreenState>(() =>
    state.session ? state.session.screen : Screens.selecting()
  );

  const highlightedExperiment = computed(() =>
    state.catalog.list()[state.catalogIndex]
  );

  const selectedField = computed(() => {
    const current = screen.value;
    if (current.kind !== 'editing' || !state.session) {
      return undefined;
    }
    return findField(state.session.experiment.schema, current.fieldKey);
  });

  const canGoBack = computed(() =>
    state.session !== null &&
    state.phase !== 'running' &&
    !isTerminalScreen(screen.value)
  );

  return { state, screen, highlightedExperiment, selectedField, canGoBack };
}

// ============================================================================
// Actions
// ============================================================================

/**
 * Clear everything that belongs to a session
 */
export function clearSession(state: WizardState): void {
  state.session = null;
  state.phase = 'idle';
  state.events = createEventLog();
  state.artifact = null;
  state.report = null;
}

/**
 * Move the catalog cursor, wrapping at both ends
 */
export function moveCatalogCursor(state: WizardState, delta: number): void {
  const size = state.catalog.size;
  if (size === 0) {
    return;
  }
  state.catalogIndex = (((state.catalogIndex + delta) % size) + size) % size;
}
