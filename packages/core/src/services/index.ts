/**
 * Core services exports
 * @module @faultline/core/services
 */

export {
  NavigationStack,
  type NavigationStackOptions,
  type NavigationResult,
  type PopResult,
} from './navigation-stack.js';

export {
  editField,
  resetField,
  validateFieldInput,
  coerceFreeText,
} from './field-editor.js';

export {
  renderArtifact,
  parseArtifact,
  buildArtifact,
  toArtifactValue,
  fromArtifactValue,
  type ArtifactNode,
  type ArtifactValue,
} from './artifact-renderer.js';

export {
  ExecutionPipeline,
  buildExecutionRequest,
  type ExecutionPipelineOptions,
} from './execution-pipeline.js';

export {
  assembleReport,
  attachSummary,
  markSummaryUnavailable,
  requestSummary,
  describeSummary,
  collectLogText,
  buildSummaryRequest,
  DEFAULT_SUMMARY_TIMEOUT_MS,
  type ReportExtras,
  type RequestSummaryOptions,
} from './report-assembler.js';

export {
  WizardController,
  createWizardController,
  type WizardControllerOptions,
  type ActivationResult,
} from './wizard-controller.js';
