/**
 * Terminal wizard screens
 *
 * Pure functions turning the wizard store into the text of one frame.
 * @module @faultline/cli/tui/screens
 */

import chalk from 'chalk';
import { describeSummary, renderArtifact, type WizardStore } from '@faultline/core';
import {
  defaultFieldValues,
  findField,
  type ExecutionEvent,
  type ExecutionEventKind,
  type ExperimentDefinition,
  type FieldSpec,
  type FieldValues,
  type Report,
  type ScreenKind,
} from '@faultline/shared';
import { formatOffset, statusBadge } from '../output.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Field being edited on the editing screen
 */
export interface EditPrompt {
  field: FieldSpec;
  buffer: string;
}

/**
 * View state the store does not hold
 */
export interface ViewState {
  prompt: EditPrompt | null;
  showHelp: boolean;
}

export const STEP_TITLES: Readonly<Record<ScreenKind, string>> = {
  selecting: '1/ Select experiment',
  editing: '2/ Configure',
  confirming: '3/ Confirm',
  running: '4/ Execute',
  reporting: '5/ Report',
};

export const KEY_HINTS: Readonly<Record<ScreenKind, string>> = {
  selecting: '(↑/↓) Move  (enter) Select  (h) Help  (q) Quit',
  editing: '(↑/↓) Move  (enter) Edit  (r) Reset  (i) Inject  (b) Back  (q) Quit',
  confirming: '(enter) Run  (b) Back  (q) Quit',
  running: 'Running... back and quit are disabled',
  reporting: '(enter) Close report  (q) Quit',
};

export const HELP_LINES: readonly string[] = [
  'up/down or k/j   move the cursor',
  'enter            select, edit a field, run or close the report',
  'i                review the manifest before running it',
  'r                reset the selected field to its default',
  'b or escape      go back',
  'h or ?           toggle this help',
  'q                quit',
];

const EVENT_MARKERS: Readonly<Record<ExecutionEventKind, string>> = {
  info: chalk.blue('·'),
  success: chalk.green('✓'),
  'chaos-occurred': chalk.magenta('⚡'),
  error: chalk.red('✗'),
};

function indent(lines: readonly string[], prefix = '  '): string[] {
  return lines.map((line) => prefix + line);
}

function artifactLines(artifact: string): string[] {
  return artifact.trimEnd().split('\n');
}

// ─────────────────────────────────────────────────────────────────────────────
// Screens
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Experiment list with a preview of the highlighted experiment
 */
export function catalogLines(
  experiments: readonly ExperimentDefinition[],
  highlighted: number,
  showHelp: boolean,
): string[] {
  const lines = experiments.map((experiment, index) =>
    index === highlighted ? chalk.bold.green(`> ${experiment.name}`) : `  ${experiment.name}`
  );

  const current = experiments[highlighted];
  if (current) {
    lines.push('', chalk.bold(current.name), current.description, '', chalk.dim('Default manifest:'));
    lines.push(...indent(artifactLines(renderArtifact(current, defaultFieldValues(current.schema)))));
  }

  if (showHelp) {
    lines.push('', chalk.bold('Help'), ...indent(HELP_LINES));
  }
  return lines;
}

function fieldValueText(field: FieldSpec, value: string): string {
  const shown = value === '' ? chalk.dim('(empty)') : value;
  return field.kind === 'enumerated' && field.options
    ? `${shown} ${chalk.dim(`[${field.options.join('|')}]`)}`
    : shown;
}

/**
 * Field list with the cursor, and the edit prompt when one is open
 */
export function fieldLines(
  experiment: ExperimentDefinition,
  values: FieldValues,
  selectedKey: string,
  prompt: EditPrompt | null,
): string[] {
  const width = Math.max(...experiment.schema.map((field) => field.label.length));
  const lines = experiment.schema.map((field) => {
    const label = field.label.padEnd(width);
    const value = fieldValueText(field, values[field.key] ?? field.defaultValue);
    return field.key === selectedKey
      ? `${chalk.bold.green(`> ${label}`)}  ${value}`
      : `  ${label}  ${value}`;
  });

  const selected = findField(experiment.schema, selectedKey);
  if (prompt) {
    lines.push('', `${chalk.bold(prompt.field.label)}: ${prompt.buffer}_`);
    if (prompt.field.kind === 'enumerated' && prompt.field.options) {
      lines.push(chalk.dim(`Options: ${prompt.field.options.join(', ')}`));
    }
  } else if (selected?.description) {
    lines.push('', chalk.dim(selected.description));
  }
  return lines;
}

/**
 * Namespace the artifact targets
 */
function targetNamespace(experiment: ExperimentDefinition, values: FieldValues): string {
  const field = findField(experiment.schema, 'namespace');
  return field?.section === 'metadata'
    ? values.namespace ?? experiment.metadata.namespace
    : experiment.metadata.namespace;
}

/**
 * Disruption warning and the artifact about to be applied
 */
export function confirmLines(experiment: ExperimentDefinition, values: FieldValues, artifact: string): string[] {
  return [
    chalk.yellow.bold(
      `Running this experiment injects ${experiment.documentKind} faults into namespace ${targetNamespace(experiment, values)}.`,
    ),
    'Review the manifest, then press enter to run it.',
    '',
    ...indent(artifactLines(artifact)),
  ];
}

/**
 * One line of the execution log
 */
export function eventLine(event: ExecutionEvent): string {
  return `${chalk.dim(formatOffset(event.timestamp))} ${EVENT_MARKERS[event.kind]} ${event.text}`;
}

/**
 * Live event stream
 */
export function runningLines(events: readonly ExecutionEvent[]): string[] {
  return [
    chalk.bold(`Events (${events.length})`),
    ...indent(events.map(eventLine)),
    '',
    chalk.dim('Waiting for output...'),
  ];
}

/**
 * Final report with values, events and the summary (or its placeholder)
 */
export function reportLines(report: Report): string[] {
  const values = Object.entries(report.finalFieldValues).map(([key, value]) => `${key} = ${value}`);

  return [
    `${chalk.bold(report.definition.name)}  ${statusBadge(report.outcome)}`,
    `Started    ${report.startedAt.toISOString()}`,
    `Completed  ${report.completedAt.toISOString()}`,
    '',
    chalk.bold('Values'),
    ...indent(values),
    '',
    chalk.bold('Events'),
    ...indent(report.events.map(eventLine)),
    '',
    `${chalk.bold('Summary')}  ${statusBadge(report.summaryStatus)}`,
    ...indent(describeSummary(report).split('\n')),
  ];
}

// ─────────────────────────────────────────────────────────────────────────────
// Frame
// ─────────────────────────────────────────────────────────────────────────────

function bodyLines(store: WizardStore, view: ViewState): string[] {
  const { state } = store;
  const screen = store.screen.value;
  const session = state.session;

  if (screen.kind === 'selecting' || !session) {
    return catalogLines(state.catalog.list(), state.catalogIndex, view.showHelp);
  }

  switch (screen.kind) {
    case 'editing':
      return fieldLines(session.experiment, session.fieldValues, screen.fieldKey, view.prompt);
    case 'confirming':
      return confirmLines(session.experiment, session.fieldValues, state.artifact ?? '');
    case 'running':
      return runningLines(state.events);
    case 'reporting':
      return state.report ? reportLines(state.report) : runningLines(state.events);
  }
}

function footerText(kind: ScreenKind, prompt: EditPrompt | null): string {
  if (!prompt) {
    return KEY_HINTS[kind];
  }
  return prompt.field.kind === 'enumerated'
    ? '(↑/↓) Cycle options  (enter) Save  (escape) Cancel'
    : '(enter) Save  (escape) Cancel';
}

/**
 * Render a whole frame
 */
export function renderWizard(store: WizardStore, view: ViewState, width = 80): string {
  const { state } = store;
  const kind = store.screen.value.kind;
  const title = state.session
    ? `faultline  ${STEP_TITLES[kind]} - ${state.session.experiment.name}`
    : `faultline  ${STEP_TITLES[kind]}`;
  const rule = chalk.dim('─'.repeat(Math.max(width, 10)));

  const lines = [chalk.bold.blue(title), rule, ...bodyLines(store, view), rule];
  if (state.notice) {
    lines.push(chalk.yellow(`! ${state.notice}`));
  }
  lines.push(chalk.dim(footerText(kind, view.prompt)));
  return lines.join('\n');
}
