/**
 * Core models
 * @module @faultline/core/models
 */

export {
  ExperimentCatalog,
  defineExperiment,
  deepFreeze,
} from './experiment-catalog.js';

export {
  WizardSession,
  createSession,
  assertSchemaKeys,
  orderBySchema,
  type SessionOptions,
} from './session.js';
