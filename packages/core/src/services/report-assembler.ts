/**
 * Report assembler
 * Builds the final report of a run and attaches the external summary
 * @module @faultline/core/services/report-assembler
 */

import { randomUUID } from 'node:crypto';
import type {
  ExecutionEvent,
  ExperimentDefinition,
  FieldValues,
  Report,
  Summarizer,
  SummaryRequest,
} from '@faultline/shared';
import {
  SUMMARY_PENDING_TEXT,
  SUMMARY_UNAVAILABLE_TEXT,
  SummaryUnavailableError,
  createServiceLogger,
  errorMessage,
  type Logger,
} from '@faultline/shared';

/**
 * Report fields that do not come from the run itself
 */
export interface ReportExtras {
  artifact: string;
  startedAt: Date;
  completedAt: Date;
  id?: string;
}

/**
 * Summary request options
 */
export interface RequestSummaryOptions {
  /** Give up after this many milliseconds */
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Default summarizer timeout
 */
export const DEFAULT_SUMMARY_TIMEOUT_MS = 30_000;

/**
 * Assemble the report of a completed run. The summary starts out pending.
 */
export function assembleReport(
  experiment: ExperimentDefinition,
  fieldValues: FieldValues,
  events: readonly ExecutionEvent[],
  extras: ReportExtras,
): Report {
  const last = events[events.length - 1];
  const report: Report = {
    id: extras.id ?? randomUUID(),
    definition: experiment,
    finalFieldValues: Object.freeze({ ...fieldValues }),
    artifact: extras.artifact,
    events: Object.freeze([...events]),
    summaryStatus: 'pending',
    outcome: last?.kind === 'error' ? 'failed' : 'succeeded',
    startedAt: extras.startedAt,
    completedAt: extras.completedAt,
  };
  return Object.freeze(report);
}

/**
 * Return a copy of the report carrying the summary
 */
export function attachSummary(report: Report, text: string): Report {
  const next: Report = { ...report, summary: text, summaryStatus: 'ready' };
  return Object.freeze(next);
}

/**
 * Return a copy of the report whose summary could not be produced
 */
export function markSummaryUnavailable(report: Report): Report {
  const { summary: _dropped, ...rest } = report;
  const next: Report = { ...rest, summaryStatus: 'unavailable' };
  return Object.freeze(next);
}

/**
 * Text to show in place of the summary
 */
export function describeSummary(report: Report): string {
  switch (report.summaryStatus) {
    case 'ready':
      return report.summary ?? SUMMARY_UNAVAILABLE_TEXT;
    case 'pending':
      return SUMMARY_PENDING_TEXT;
    case 'unavailable':
      return SUMMARY_UNAVAILABLE_TEXT;
  }
}

/**
 * Concatenate event text, one line per event
 */
export function collectLogText(events: readonly ExecutionEvent[]): string {
  return events.map((event) => event.text).join('\n');
}

/**
 * Build the summarizer input from a report
 */
export function buildSummaryRequest(report: Report): SummaryRequest {
  const { bindings, documentKind } = report.definition;
  const valueOf = (key: string | undefined): string =>
    key === undefined ? '' : report.finalFieldValues[key] ?? '';

  return {
    documentKind,
    action: valueOf(bindings.action),
    target: valueOf(bindings.target),
    duration: valueOf(bindings.duration),
    logs: collectLogText(report.events),
  };
}

/**
 * Ask the summarizer for a summary and attach it.
 *
 * Never rejects: an error, a timeout or an empty answer resolves with the
 * report marked unavailable.
 */
export async function requestSummary(
  report: Report,
  summarizer: Summarizer,
  options: RequestSummaryOptions,
): Promise<Report> {
  const log = options.logger ?? createServiceLogger({ component: 'report-assembler' });
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(SummaryUnavailableError.timeout(options.timeoutMs)), options.timeoutMs);
  });

  try {
    const text = await Promise.race([summarizer.summarize(buildSummaryRequest(report)), timeout]);
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      log.warn('Summarizer returned an empty summary', { reportId: report.id, summarizer: summarizer.name });
      return markSummaryUnavailable(report);
    }
    log.debug('Summary attached', { reportId: report.id, summarizer: summarizer.name });
    return attachSummary(report, trimmed);
  } catch (err) {
    log.warn('Summary unavailable', {
      reportId: report.id,
      summarizer: summarizer.name,
      reason: errorMessage(err),
    });
    return markSummaryUnavailable(report);
  } finally {
    clearTimeout(timer);
  }
}
