/**
 * Execution Pipeline
 *
 * Drives one experiment run through idle -> confirmed -> running -> complete.
 * The pipeline sequences and timestamps what the executor produces; it does
 * not interpret events beyond detecting the end of the stream.
 *
 * Events:
 * - 'phase'    (phase: PipelinePhase)
 * - 'event'    (event: ExecutionEvent)
 * - 'complete' (report: Report)
 */

import { EventEmitter } from 'node:events';
import type {
  ExecutionEvent,
  ExecutionEventKind,
  ExecutionRequest,
  Executor,
  ExperimentDefinition,
  FieldValues,
  PipelinePhase,
  Report,
} from '@faultline/shared';
import {
  ExecutionError,
  PipelineStateError,
  createServiceLogger,
  errorMessage,
  type Logger,
} from '@faultline/shared';
import type { WizardSession } from '../models/session.js';
import { renderArtifact } from './artifact-renderer.js';
import { assembleReport } from './report-assembler.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ExecutionPipelineOptions {
  /** Event producer */
  executor: Executor;
  /** Monotonic clock in milliseconds */
  clock?: () => number;
  /** Wall clock for report timestamps */
  now?: () => Date;
  /** Called with every event as it is appended */
  onEvent?: (event: ExecutionEvent) => void;
  logger?: Logger;
}

/**
 * Build the executor request from the experiment's bindings. An unbound
 * role is sent as an empty string.
 */
export function buildExecutionRequest(
  experiment: ExperimentDefinition,
  fieldValues: FieldValues,
  artifact: string,
): ExecutionRequest {
  const valueOf = (key: string | undefined): string =>
    key === undefined ? '' : fieldValues[key] ?? '';

  return {
    experimentId: experiment.id,
    documentKind: experiment.documentKind,
    action: valueOf(experiment.bindings.action),
    target: valueOf(experiment.bindings.target),
    duration: valueOf(experiment.bindings.duration),
    artifact,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Execution Pipeline
// ─────────────────────────────────────────────────────────────────────────────

export class ExecutionPipeline extends EventEmitter {
  private readonly executor: Executor;
  private readonly clock: () => number;
  private readonly now: () => Date;
  private readonly onEvent?: (event: ExecutionEvent) => void;
  private readonly logger: Logger;

  private currentPhase: PipelinePhase = 'idle';
  private confirmedSession: WizardSession | null = null;
  private renderedArtifact: string | null = null;
  private eventLog: ExecutionEvent[] = [];
  private lastReport: Report | null = null;
  private clockOrigin = 0;
  private lastTimestamp = 0;

  constructor(options: ExecutionPipelineOptions) {
    super();
    this.executor = options.executor;
    this.clock = options.clock ?? (() => performance.now());
    this.now = options.now ?? (() => new Date());
    this.onEvent = options.onEvent;
    this.logger = options.logger ?? createServiceLogger({ component: 'execution-pipeline' });
  }

  get phase(): PipelinePhase {
    return this.currentPhase;
  }

  /**
   * Artifact rendered at confirmation, null before
   */
  get artifact(): string | null {
    return this.renderedArtifact;
  }

  /**
   * Events of the current run in emission order
   */
  get events(): readonly ExecutionEvent[] {
    return this.eventLog;
  }

  /**
   * Report of the last completed run
   */
  get report(): Report | null {
    return this.lastReport;
  }

  /**
   * True while events are being produced
   */
  isActive(): boolean {
    return this.currentPhase === 'running';
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Transitions
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Record the operator's explicit confirmation and render the artifact
   * that will be handed to the executor
   */
  confirm(session: WizardSession): string {
    this.assertPhase('confirm', 'idle');
    const artifact = renderArtifact(session.experiment, session.fieldValues);
    this.confirmedSession = session;
    this.renderedArtifact = artifact;
    this.setPhase('confirmed');
    this.logger.forSession(session.id, session.experiment.id).info('Execution confirmed', {
      documentKind: session.experiment.documentKind,
    });
    return artifact;
  }

  /**
   * Withdraw a confirmation before the run starts
   */
  cancel(): void {
    this.assertPhase('cancel', 'confirmed');
    this.confirmedSession = null;
    this.renderedArtifact = null;
    this.setPhase('idle');
  }

  /**
   * Return a completed pipeline to idle so the session can be redone
   */
  reset(): void {
    this.assertPhase('reset', 'complete');
    this.confirmedSession = null;
    this.renderedArtifact = null;
    this.eventLog = [];
    this.lastReport = null;
    this.setPhase('idle');
  }

  /**
   * Run the confirmed session to completion.
   *
   * Each event is appended and emitted as it arrives. A producer failure is
   * recorded as one terminal error event; the run still completes and the
   * returned promise resolves with the report. Listener failures are logged
   * and do not end the run.
   */
  async run(session: WizardSession): Promise<Report> {
    this.assertPhase('run', 'confirmed');
    const artifact = this.renderedArtifact;
    if (this.confirmedSession !== session || artifact === null) {
      throw new PipelineStateError('run an unconfirmed session', this.currentPhase);
    }

    const log = this.logger.forSession(session.id, session.experiment.id);
    const startedAt = this.now();
    this.eventLog = [];
    this.clockOrigin = this.clock();
    this.lastTimestamp = 0;
    this.setPhase('running');

    const request = buildExecutionRequest(session.experiment, session.fieldValues, artifact);
    log.info('Execution started', { executor: this.executor.name, action: request.action, target: request.target });

    try {
      for await (const produced of this.executor.execute(request)) {
        this.append(produced.text, produced.kind);
        if (produced.kind === 'error') {
          // An error event is always the last one
          break;
        }
      }
    } catch (err) {
      const failure = ExecutionError.fromProducer(err, this.executor.name);
      log.warn('Executor failed', { error: failure.toLog() });
      this.append(failure.message, 'error');
    }

    const report = assembleReport(session.experiment, session.snapshot(), this.eventLog, {
      artifact,
      startedAt,
      completedAt: this.now(),
    });
    this.lastReport = report;
    this.setPhase('complete');
    log.info('Execution complete', { outcome: report.outcome, events: report.events.length });
    this.notify('complete', () => this.emit('complete', report));
    return report;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private append(text: string, kind: ExecutionEventKind): void {
    // Clamp so a clock stepping backwards never reorders timestamps
    const elapsed = this.clock() - this.clockOrigin;
    this.lastTimestamp = Math.max(this.lastTimestamp, elapsed);

    const event: ExecutionEvent = Object.freeze({
      sequence: this.eventLog.length,
      timestamp: this.lastTimestamp,
      text,
      kind,
    });
    this.eventLog.push(event);
    this.notify('event', () => {
      this.emit('event', event);
      this.onEvent?.(event);
    });
  }

  /**
   * Run listener callbacks. A throwing listener is logged; it never becomes
   * a producer failure and never stops the run from completing.
   */
  private notify(name: string, callback: () => void): void {
    try {
      callback();
    } catch (err) {
      this.logger.error('Pipeline listener failed', { listener: name, reason: errorMessage(err) });
    }
  }

  private assertPhase(operation: string, expected: PipelinePhase): void {
    if (this.currentPhase !== expected) {
      throw new PipelineStateError(operation, this.currentPhase);
    }
  }

  private setPhase(phase: PipelinePhase): void {
    this.currentPhase = phase;
    this.notify('phase', () => this.emit('phase', phase));
  }
}
