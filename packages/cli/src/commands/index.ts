/**
 * CLI Commands
 *
 * Exports all CLI command builders.
 * @module @faultline/cli/commands
 */

export { createCatalogCommand } from './catalog.js';
export { createRenderCommand, createCheckCommand } from './render.js';
export { createRunCommand } from './run.js';
export { createWizardCommand } from './wizard.js';
export { createConfigCommand } from './config.js';
