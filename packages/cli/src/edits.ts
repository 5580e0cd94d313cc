/**
 * Field assignments given on the command line (`--set key=value`)
 * @module @faultline/cli/edits
 */

import { editField } from '@faultline/core';
import {
  ValidationError,
  defaultFieldValues,
  type ExperimentDefinition,
  type FieldValues,
  type ValidationErrorDetail,
} from '@faultline/shared';

/**
 * Split `key=value` at the first `=`. The value may be empty.
 */
export function parseAssignment(text: string): [key: string, value: string] {
  const separator = text.indexOf('=');
  if (separator <= 0) {
    throw ValidationError.invalidFormat('--set', 'key=value', text);
  }
  return [text.slice(0, separator), text.slice(separator + 1)];
}

/**
 * Apply assignments in order over the schema defaults, collecting every
 * rejected one
 */
export function applyAssignments(experiment: ExperimentDefinition, assignments: readonly string[]): FieldValues {
  let values = defaultFieldValues(experiment.schema);
  const errors: ValidationErrorDetail[] = [];

  for (const assignment of assignments) {
    const [key, rawInput] = parseAssignment(assignment);
    const result = editField(experiment.schema, values, key, rawInput);
    if (result.valid) {
      values = result.value;
    } else {
      errors.push(...result.error.details);
    }
  }

  if (errors.length > 0) {
    throw ValidationError.multiple(errors);
  }
  return values;
}
