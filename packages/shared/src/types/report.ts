/**
 * Execution report type definitions
 * @module @faultline/shared/types/report
 */

import type { ExperimentDefinition, FieldValues } from './experiment.js';
import type { ExecutionEvent } from './execution.js';

/**
 * Lifecycle of the report summary
 */
export type SummaryStatus =
  | 'pending'      // Summarizer not finished (or not started)
  | 'ready'        // Summary attached
  | 'unavailable'; // Summarizer failed, timed out or is not configured

/**
 * Overall result of a run
 */
export type ReportOutcome = 'succeeded' | 'failed';

/**
 * Final record of one execution
 */
export interface Report {
  /** Report ID */
  readonly id: string;
  /** Experiment that ran (shared reference) */
  readonly definition: ExperimentDefinition;
  /** Field values frozen when the run completed */
  readonly finalFieldValues: Readonly<Record<string, string>>;
  /** Artifact handed to the executor */
  readonly artifact: string;
  /** Events in emission order */
  readonly events: readonly ExecutionEvent[];
  /** Natural-language summary */
  readonly summary?: string;
  /** Summary lifecycle */
  readonly summaryStatus: SummaryStatus;
  /** Failed when the last event is an error */
  readonly outcome: ReportOutcome;
  /** Run start */
  readonly startedAt: Date;
  /** Run completion */
  readonly completedAt: Date;
}

/**
 * Report as written to disk
 */
export interface ReportRecord {
  id: string;
  experiment: string;
  documentKind: string;
  outcome: ReportOutcome;
  fieldValues: FieldValues;
  artifact: string;
  events: ExecutionEvent[];
  summary: string | null;
  summaryStatus: SummaryStatus;
  startedAt: string;
  completedAt: string;
}

/**
 * Placeholder shown while the summary is being produced
 */
export const SUMMARY_PENDING_TEXT = 'analysis pending';

/**
 * Placeholder shown when no summary could be produced
 */
export const SUMMARY_UNAVAILABLE_TEXT = 'analysis unavailable';

/**
 * Convert a report to its serializable record
 */
export function toReportRecord(report: Report): ReportRecord {
  return {
    id: report.id,
    experiment: report.definition.id,
    documentKind: report.definition.documentKind,
    outcome: report.outcome,
    fieldValues: { ...report.finalFieldValues },
    artifact: report.artifact,
    events: [...report.events],
    summary: report.summary ?? null,
    summaryStatus: report.summaryStatus,
    startedAt: report.startedAt.toISOString(),
    completedAt: report.completedAt.toISOString(),
  };
}
