/**
 * Shared types for faultline
 * @module @faultline/shared/types
 */

// Experiment catalog types
export type {
  FieldKind,
  FieldFormat,
  FieldSection,
  FieldSpec,
  FieldSchema,
  FieldValues,
  ExecutionRole,
  ExecutionBindings,
  ArtifactMetadata,
  ExperimentDefinition,
  ExperimentDefinitionInput,
} from './experiment.js';

export {
  ALL_FIELD_KINDS,
  ALL_FIELD_FORMATS,
  ALL_FIELD_SECTIONS,
  METADATA_FIELD_KEYS,
  getFieldLeaf,
  findField,
  defaultFieldValues,
} from './experiment.js';

// Screen types
export type {
  ScreenKind,
  ScreenState,
} from './screen.js';

export {
  SCREEN_TRANSITIONS,
  TERMINAL_SCREENS,
  Screens,
  canTransition,
  isTerminalScreen,
  isSameScreen,
  describeScreen,
} from './screen.js';

// Execution types
export type {
  ExecutionEventKind,
  PipelinePhase,
  ExecutionEvent,
  ProducedEvent,
  ExecutionRequest,
  Executor,
  SummaryRequest,
  Summarizer,
} from './execution.js';

export { ALL_EVENT_KINDS } from './execution.js';

// Report types
export type {
  SummaryStatus,
  ReportOutcome,
  Report,
  ReportRecord,
} from './report.js';

export {
  SUMMARY_PENDING_TEXT,
  SUMMARY_UNAVAILABLE_TEXT,
  toReportRecord,
} from './report.js';
