/**
 * Validation functions for faultline
 * @module @faultline/shared/validation
 */

export {
  validateFieldSpec,
  validateSchemaInvariants,
  validateExperimentDefinition,
  validateCatalog,
  isValidDottedPath,
} from './experiment-validation.js';

export {
  containsControlCharacters,
  isNumericLike,
  toCanonicalNumber,
} from './field-input-validation.js';
