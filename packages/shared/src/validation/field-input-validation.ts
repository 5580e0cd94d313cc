/**
 * Field input checks used by the field editor
 * @module @faultline/shared/validation/field-input-validation
 */

/**
 * C0 controls, DEL and C1 controls
 */
const CONTROL_CHARACTER_PATTERN = /[\u0000-\u001f\u007f-\u009f]/;

/**
 * Decimal numbers as an operator would type them: optional sign,
 * digits with an optional fraction, optional exponent
 */
const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Check whether input contains control characters
 */
export function containsControlCharacters(input: string): boolean {
  return CONTROL_CHARACTER_PATTERN.test(input);
}

/**
 * Check whether a value looks like a finite number
 */
export function isNumericLike(value: string): boolean {
  const trimmed = value.trim();
  return NUMERIC_PATTERN.test(trimmed) && Number.isFinite(Number(trimmed));
}

/**
 * Parse numeric-looking input to its canonical decimal string, or null
 */
export function toCanonicalNumber(value: string): string | null {
  if (!isNumericLike(value)) {
    return null;
  }
  return String(Number(value.trim()));
}
