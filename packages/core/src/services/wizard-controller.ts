/**
 * Wizard controller
 * Abstract command surface (select, activate, back, quit) over the wizard store
 * @module @faultline/core/services/wizard-controller
 */

import type {
  Executor,
  FieldSpec,
  FieldValues,
  PipelinePhase,
  Report,
  Summarizer,
  ValidationResult,
} from '@faultline/shared';
import {
  Screens,
  createServiceLogger,
  errorMessage,
  type Logger,
} from '@faultline/shared';
import type { ExperimentCatalog } from '../models/experiment-catalog.js';
import { createSession, type WizardSession } from '../models/session.js';
import { clearSession, createWizardStore, moveCatalogCursor, type WizardStore } from '../stores/wizard-store.js';
import { renderArtifact } from './artifact-renderer.js';
import { ExecutionPipeline } from './execution-pipeline.js';
import { editField, resetField } from './field-editor.js';
import type { NavigationResult, PopResult } from './navigation-stack.js';
import { DEFAULT_SUMMARY_TIMEOUT_MS, markSummaryUnavailable, requestSummary } from './report-assembler.js';

/**
 * Wizard controller options
 */
export interface WizardControllerOptions {
  catalog: ExperimentCatalog;
  executor: Executor;
  /** Summary source; reports stay unsummarized without one */
  summarizer?: Summarizer;
  summaryTimeoutMs?: number;
  /** Monotonic clock handed to each pipeline */
  clock?: () => number;
  now?: () => Date;
  logger?: Logger;
  /** Called once per run with the report after its summary settled */
  onReport?: (report: Report) => void | Promise<void>;
}

/**
 * What `activate` did
 */
export type ActivationResult =
  | { type: 'session-started'; session: WizardSession }
  | { type: 'edit-field'; field: FieldSpec; current: string }
  | { type: 'execution-started'; completion: Promise<Report> }
  | { type: 'session-ended' }
  | { type: 'ignored'; reason: string };

/**
 * Drives one operator's wizard flow. Navigation and edits are synchronous;
 * the run and the summary request are background tasks tracked until
 * `settled()`.
 */
export class WizardController {
  readonly store: WizardStore;

  private readonly executor: Executor;
  private readonly summarizer?: Summarizer;
  private readonly summaryTimeoutMs: number;
  private readonly clock?: () => number;
  private readonly now?: () => Date;
  private readonly logger: Logger;
  private readonly onReport?: (report: Report) => void | Promise<void>;
  private readonly tasks = new Set<Promise<void>>();
  private pipeline: ExecutionPipeline | null = null;

  constructor(options: WizardControllerOptions) {
    this.store = createWizardStore(options.catalog);
    this.executor = options.executor;
    this.summarizer = options.summarizer;
    this.summaryTimeoutMs = options.summaryTimeoutMs ?? DEFAULT_SUMMARY_TIMEOUT_MS;
    this.clock = options.clock;
    this.now = options.now;
    this.logger = options.logger ?? createServiceLogger({ component: 'wizard-controller' });
    this.onReport = options.onReport;
  }

  /**
   * True while an execution is producing events
   */
  isRunning(): boolean {
    return this.pipeline?.isActive() ?? false;
  }

  /**
   * Move the cursor: catalog rows on the catalog screen, fields on the
   * editing screen. Ignored elsewhere.
   */
  select(delta: number): void {
    const { state, screen } = this.store;
    const current = screen.value;
    state.notice = null;

    if (current.kind === 'selecting') {
      moveCatalogCursor(state, delta);
      return;
    }

    const session = state.session;
    if (current.kind !== 'editing' || !session) {
      return;
    }

    const schema = session.experiment.schema;
    const index = schema.findIndex((field) => field.key === current.fieldKey);
    const next = schema[(((index + delta) % schema.length) + schema.length) % schema.length];
    if (next && next.key !== current.fieldKey) {
      session.navigation.replace(Screens.editing(next.key));
    }
  }

  /**
   * Enter: start a session, edit a field, confirm the run or close the report
   */
  activate(): ActivationResult {
    const { state, screen } = this.store;
    const current = screen.value;
    const session = state.session;
    state.notice = null;

    switch (current.kind) {
      case 'selecting': {
        const experiment = this.store.highlightedExperiment.value;
        if (!experiment) {
          return { type: 'ignored', reason: 'The catalog is empty' };
        }
        return { type: 'session-started', session: this.startSession(experiment.id) };
      }
      case 'editing': {
        const field = this.store.selectedField.value;
        if (!field || !session) {
          return { type: 'ignored', reason: 'No field selected' };
        }
        return { type: 'edit-field', field, current: session.fieldValues[field.key] ?? field.defaultValue };
      }
      case 'confirming': {
        if (!session || !this.pipeline) {
          return { type: 'ignored', reason: 'No active session' };
        }
        return { type: 'execution-started', completion: this.startExecution(session, this.pipeline) };
      }
      case 'running':
        return { type: 'ignored', reason: 'An experiment is running' };
      case 'reporting':
        this.endSession();
        return { type: 'session-ended' };
    }
  }

  /**
   * Apply an edit to the selected field. Null when no field is selected.
   */
  submitEdit(rawInput: string): ValidationResult<FieldValues> | null {
    const session = this.store.state.session;
    const field = this.store.selectedField.value;
    if (!session || !field) {
      return null;
    }

    const result = editField(session.experiment.schema, session.fieldValues, field.key, rawInput);
    this.applyEdit(session, field, result);
    return result;
  }

  /**
   * Restore the selected field to its default. Null when no field is selected.
   */
  resetSelectedField(): ValidationResult<FieldValues> | null {
    const session = this.store.state.session;
    const field = this.store.selectedField.value;
    if (!session || !field) {
      return null;
    }

    const result = resetField(session.experiment.schema, session.fieldValues, field.key);
    this.applyEdit(session, field, result);
    return result;
  }

  /**
   * Render the artifact and show the confirmation screen
   */
  inject(): NavigationResult | null {
    const { state, screen } = this.store;
    const session = state.session;
    if (!session || screen.value.kind !== 'editing') {
      return null;
    }

    const artifact = renderArtifact(session.experiment, session.fieldValues);
    const result = session.navigation.push(Screens.confirming());
    if (result.ok) {
      state.artifact = artifact;
      state.notice = null;
    } else {
      state.notice = result.error.message;
    }
    return result;
  }

  /**
   * Back: pop a screen, or leave the session from its first screen.
   * Null on the catalog screen.
   */
  back(): PopResult | null {
    const { state } = this.store;
    const session = state.session;
    if (!session) {
      return null;
    }

    const leaving = session.screen;
    const result = session.navigation.pop();
    if (!result.ok) {
      state.notice = result.error.message;
      return result;
    }

    state.notice = null;
    if (result.exited) {
      this.endSession();
    } else if (leaving.kind === 'confirming') {
      state.artifact = null;
    }
    return result;
  }

  /**
   * Ask to leave the program. Refused while an execution is running.
   */
  quit(): boolean {
    const { state } = this.store;
    if (this.isRunning()) {
      state.notice = 'Cannot quit while an experiment is running';
      return false;
    }
    state.quitRequested = true;
    return true;
  }

  /**
   * True while a run or summary request is still in flight
   */
  hasPendingTasks(): boolean {
    return this.tasks.size > 0;
  }

  /**
   * Resolve once every execution and summary task has finished
   */
  async settled(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  // ============================================================================
  // Session lifecycle
  // ============================================================================

  private startSession(experimentId: string): WizardSession {
    const { state } = this.store;
    const experiment = state.catalog.require(experimentId);

    const pipeline = new ExecutionPipeline({
      executor: this.executor,
      clock: this.clock,
      now: this.now,
      logger: this.logger,
      onEvent: (event) => {
        state.events.push(event);
      },
    });
    pipeline.on('phase', (phase: PipelinePhase) => {
      state.phase = phase;
    });

    const session = createSession(experiment, {
      isLocked: () => pipeline.isActive(),
      logger: this.logger,
    });

    clearSession(state);
    this.pipeline = pipeline;
    state.session = session;
    this.logger.forSession(session.id, experiment.id).info('Session started', { experiment: experiment.name });
    return session;
  }

  private endSession(): void {
    const { state } = this.store;
    const session = state.session;
    if (session) {
      this.logger.forSession(session.id, session.experiment.id).info('Session ended');
    }
    this.pipeline?.removeAllListeners();
    this.pipeline = null;
    clearSession(state);
  }

  private applyEdit(
    session: WizardSession,
    field: FieldSpec,
    result: ValidationResult<FieldValues>,
  ): void {
    const { state } = this.store;
    if (!result.valid) {
      const detail = result.error.details[0]?.message;
      state.notice = detail ? `${field.label}: ${detail}` : result.error.message;
      return;
    }
    if (result.value !== session.fieldValues) {
      session.commit(result.value);
    }
    state.notice = null;
  }

  // ============================================================================
  // Execution
  // ============================================================================

  private startExecution(session: WizardSession, pipeline: ExecutionPipeline): Promise<Report> {
    const { state } = this.store;
    state.artifact = pipeline.confirm(session);
    session.navigation.replace(Screens.running());

    const completion = pipeline.run(session).then((report) => {
      // The session cannot end while running, so it is still the active one
      state.report = report;
      session.navigation.replace(Screens.reporting());
      this.track(this.summarize(report));
      return report;
    });
    this.track(completion.then(() => undefined));
    return completion;
  }

  private async summarize(report: Report): Promise<void> {
    const { state } = this.store;
    const settled = this.summarizer
      ? await requestSummary(report, this.summarizer, {
          timeoutMs: this.summaryTimeoutMs,
          logger: this.logger,
        })
      : markSummaryUnavailable(report);

    // The operator may have closed the report while the summary was pending
    if (state.report?.id === report.id) {
      state.report = settled;
    }
    await this.onReport?.(settled);
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((err: unknown) => {
        this.logger.error('Background task failed', { reason: errorMessage(err) });
        this.store.state.notice = errorMessage(err);
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }
}

/**
 * Create a wizard controller
 */
export function createWizardController(options: WizardControllerOptions): WizardController {
  return new WizardController(options);
}
