/**
 * Reactive stores
 * @module @faultline/core/stores
 */

export {
  createWizardStore,
  createEventLog,
  clearSession,
  moveCatalogCursor,
  type WizardState,
  type WizardStore,
} from './wizard-store.js';
