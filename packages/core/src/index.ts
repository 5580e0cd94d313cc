/**
 * Faultline Core Package
 * Navigation and execution state engine of the wizard, with Vue reactivity for state
 * @module @faultline/core
 */

// Export reactive stores
export * from './stores/index.js';

// Export models
export * from './models/index.js';

// Export services
export * from './services/index.js';

// Export Vue reactivity utilities for consumers
export {
  effect,
  stop,
  toRaw,
  type ReactiveEffectRunner,
} from '@vue/reactivity';
