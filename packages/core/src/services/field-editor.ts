/**
 * Field editor
 * Validates and coerces a raw edit against the field schema
 * @module @faultline/core/services/field-editor
 */

import type { FieldSchema, FieldSpec, FieldValues, ValidationResult } from '@faultline/shared';
import {
  ValidationError,
  containsControlCharacters,
  findField,
  invalidResult,
  isNumericLike,
  toCanonicalNumber,
  validResult,
} from '@faultline/shared';
import { orderBySchema } from '../models/session.js';

/**
 * Best-effort coercion of a free-text edit: when the current value is
 * numeric-looking the replacement is parsed as a number and stored in its
 * canonical form, otherwise (or when parsing fails) it is kept verbatim.
 */
export function coerceFreeText(current: string, rawInput: string): string {
  if (!isNumericLike(current)) {
    return rawInput;
  }
  return toCanonicalNumber(rawInput) ?? rawInput;
}

/**
 * Check a raw input against one field and return the value to store
 */
export function validateFieldInput(
  field: FieldSpec,
  current: string,
  rawInput: string,
): ValidationResult<string> {
  if (field.kind === 'enumerated') {
    const options = field.options ?? [];
    if (!options.includes(rawInput)) {
      return invalidResult(ValidationError.invalidOption(field.key, options, rawInput));
    }
    return validResult(rawInput);
  }

  if (containsControlCharacters(rawInput)) {
    return invalidResult(ValidationError.invalidCharacters(field.key, rawInput));
  }
  return validResult(coerceFreeText(current, rawInput));
}

/**
 * Apply an edit to one field.
 *
 * Returns a new frozen mapping; `fieldValues` is never mutated, so
 * abandoning an edit is simply dropping the result. Editing a field to its
 * current value returns the same mapping.
 */
export function editField(
  schema: FieldSchema,
  fieldValues: FieldValues,
  key: string,
  rawInput: string,
): ValidationResult<FieldValues> {
  const field = findField(schema, key);
  if (!field) {
    return invalidResult(ValidationError.unknownField(key));
  }

  const current = fieldValues[key] ?? field.defaultValue;
  if (rawInput === current) {
    return validResult(fieldValues);
  }

  const checked = validateFieldInput(field, current, rawInput);
  if (!checked.valid) {
    return checked;
  }
  if (checked.value === current) {
    return validResult(fieldValues);
  }

  return validResult(orderBySchema(schema, { ...fieldValues, [key]: checked.value }));
}

/**
 * Restore one field to its schema default
 */
export function resetField(
  schema: FieldSchema,
  fieldValues: FieldValues,
  key: string,
): ValidationResult<FieldValues> {
  const field = findField(schema, key);
  if (!field) {
    return invalidResult(ValidationError.unknownField(key));
  }
  if (fieldValues[key] === field.defaultValue) {
    return validResult(fieldValues);
  }
  return validResult(orderBySchema(schema, { ...fieldValues, [key]: field.defaultValue }));
}
