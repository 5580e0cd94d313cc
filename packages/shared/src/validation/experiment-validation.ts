/**
 * Experiment catalog validation
 * @module @faultline/shared/validation/experiment-validation
 */

import {
  ALL_FIELD_FORMATS,
  ALL_FIELD_KINDS,
  ALL_FIELD_SECTIONS,
  METADATA_FIELD_KEYS,
  getFieldLeaf,
  type ArtifactMetadata,
  type ExecutionBindings,
  type ExecutionRole,
  type ExperimentDefinition,
  type FieldFormat,
  type FieldKind,
  type FieldSection,
  type FieldSpec,
} from '../types/experiment.js';
import { ErrorCode } from '../errors/base-error.js';
import {
  ValidationError,
  validResult,
  invalidResult,
  type ValidationErrorDetail,
  type ValidationResult,
} from '../errors/validation-error.js';
import { containsControlCharacters } from './field-input-validation.js';

/**
 * Experiment ID pattern: lowercase slug
 */
const EXPERIMENT_ID_PATTERN = /^[a-z][a-z0-9-]{0,62}$/;

/**
 * Roles an experiment may bind
 */
const EXECUTION_ROLES: readonly ExecutionRole[] = ['action', 'target', 'duration'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isFieldKind(value: unknown): value is FieldKind {
  return ALL_FIELD_KINDS.some((kind) => kind === value);
}

function isFieldFormat(value: unknown): value is FieldFormat {
  return ALL_FIELD_FORMATS.some((format) => format === value);
}

function isFieldSection(value: unknown): value is FieldSection {
  return ALL_FIELD_SECTIONS.some((section) => section === value);
}

/**
 * Check that every segment of a dotted path is non-empty
 */
export function isValidDottedPath(path: string): boolean {
  return path.length > 0 && path.split('.').every((segment) => segment.length > 0);
}

/**
 * Validate one field spec. Errors are appended to `errors`; the spec is
 * returned when its own shape is valid.
 */
export function validateFieldSpec(
  input: unknown,
  path: string,
  errors: ValidationErrorDetail[],
): FieldSpec | null {
  if (!isRecord(input)) {
    errors.push({ field: path, message: 'Field spec must be an object', rule: 'type' });
    return null;
  }

  const before = errors.length;
  const { key, label, kind, options, defaultValue, block, format, section, description } = input;

  if (!isNonEmptyString(key) || !isValidDottedPath(key)) {
    errors.push({
      field: `${path}.key`,
      message: 'Field key must be a dotted path with non-empty segments',
      rule: 'format',
      received: key,
    });
  }

  if (!isNonEmptyString(label)) {
    errors.push({ field: `${path}.label`, message: 'Field label is required', rule: 'required' });
  }

  if (!isFieldKind(kind)) {
    errors.push({
      field: `${path}.kind`,
      message: `Field kind must be one of ${ALL_FIELD_KINDS.join(', ')}`,
      rule: 'enum',
      received: kind,
    });
  }

  if (typeof defaultValue !== 'string') {
    errors.push({ field: `${path}.defaultValue`, message: 'Default value must be a string', rule: 'type' });
  } else if (containsControlCharacters(defaultValue)) {
    errors.push({ field: `${path}.defaultValue`, message: 'Default value contains control characters', rule: 'characters' });
  }

  let parsedOptions: string[] | undefined;
  if (kind === 'enumerated') {
    if (!Array.isArray(options) || options.length === 0 || !options.every((o) => typeof o === 'string')) {
      errors.push({
        field: `${path}.options`,
        message: 'Enumerated fields need a non-empty list of string options',
        rule: 'required',
      });
    } else {
      parsedOptions = options.map(String);
      if (new Set(parsedOptions).size !== parsedOptions.length) {
        errors.push({ field: `${path}.options`, message: 'Options must be unique', rule: 'unique' });
      }
      if (typeof defaultValue === 'string' && !parsedOptions.includes(defaultValue)) {
        errors.push({
          field: `${path}.defaultValue`,
          message: 'Default value must be one of the options',
          rule: 'option',
          expected: parsedOptions.join(', '),
          received: defaultValue,
        });
      }
    }
  } else if (options !== undefined) {
    errors.push({ field: `${path}.options`, message: 'Only enumerated fields take options', rule: 'constraint' });
  }

  if (block !== undefined) {
    if (!isNonEmptyString(block) || !isValidDottedPath(block)) {
      errors.push({ field: `${path}.block`, message: 'Block must be a dotted path with non-empty segments', rule: 'format' });
    } else if (typeof key === 'string') {
      const leaf = key.startsWith(`${block}.`) ? key.slice(block.length + 1) : '';
      if (leaf.length === 0 || leaf.includes('.')) {
        errors.push({
          field: `${path}.key`,
          message: `Key must be "${block}.<leaf>" with a single leaf segment`,
          rule: 'block',
          received: key,
        });
      }
    }
  }

  if (format !== undefined && !isFieldFormat(format)) {
    errors.push({
      field: `${path}.format`,
      message: `Format must be one of ${ALL_FIELD_FORMATS.join(', ')}`,
      rule: 'enum',
      received: format,
    });
  }

  if (section !== undefined) {
    if (!isFieldSection(section)) {
      errors.push({
        field: `${path}.section`,
        message: `Section must be one of ${ALL_FIELD_SECTIONS.join(', ')}`,
        rule: 'enum',
        received: section,
      });
    } else if (section === 'metadata' && !METADATA_FIELD_KEYS.some((k) => k === key)) {
      errors.push({
        field: `${path}.section`,
        message: `Metadata fields must use one of the keys ${METADATA_FIELD_KEYS.join(', ')}`,
        rule: 'constraint',
        received: key,
      });
    } else if (section === 'metadata' && block !== undefined) {
      errors.push({ field: `${path}.block`, message: 'Metadata fields cannot be nested', rule: 'constraint' });
    }
  }

  if (description !== undefined && typeof description !== 'string') {
    errors.push({ field: `${path}.description`, message: 'Description must be a string', rule: 'type' });
  }

  if (errors.length > before) {
    return null;
  }

  const spec: FieldSpec = {
    key: String(key),
    label: String(label),
    kind: isFieldKind(kind) ? kind : 'free-text',
    defaultValue: String(defaultValue),
  };
  if (parsedOptions) spec.options = parsedOptions;
  if (typeof block === 'string') spec.block = block;
  if (isFieldFormat(format)) spec.format = format;
  if (isFieldSection(section)) spec.section = section;
  if (typeof description === 'string') spec.description = description;
  return spec;
}

/**
 * Segments of the rendered path a field's value is written to. A key without
 * a block is one literal segment, dots included.
 */
function valuePath(field: FieldSpec): string[] {
  return field.block ? [...field.block.split('.'), getFieldLeaf(field)] : [field.key];
}

/**
 * Check schema-wide invariants: unique keys, and no block nested under a
 * path that already holds a field value
 */
export function validateSchemaInvariants(
  schema: readonly FieldSpec[],
  path: string,
  errors: ValidationErrorDetail[],
): void {
  const seen = new Set<string>();
  for (const field of schema) {
    if (seen.has(field.key)) {
      errors.push({
        field: `${path}.schema`,
        message: `Duplicate field key: ${field.key}`,
        rule: 'unique',
        received: field.key,
      });
    }
    seen.add(field.key);
  }

  // A block path must not run through the value of another field
  const specFields = schema.filter((field) => field.section !== 'metadata');
  const valueOwners = new Map<string, FieldSpec>();
  for (const field of specFields) {
    valueOwners.set(JSON.stringify(valuePath(field)), field);
  }
  for (const field of specFields) {
    if (!field.block) continue;
    const segments = field.block.split('.');
    for (let length = 1; length <= segments.length; length++) {
      const owner = valueOwners.get(JSON.stringify(segments.slice(0, length)));
      if (!owner) continue;
      errors.push({
        field: `${path}.schema`,
        message: owner.block
          ? `Block ${field.block} collides with nested field ${owner.key}`
          : `Block ${field.block} collides with top-level field ${owner.key}`,
        rule: 'block',
        received: field.key,
      });
      break;
    }
  }

  const metadataKeys = schema.filter((f) => f.section === 'metadata').map((f) => f.key);
  if (new Set(metadataKeys).size !== metadataKeys.length) {
    errors.push({ field: `${path}.schema`, message: 'Metadata keys may be overridden once', rule: 'unique' });
  }
}

function validateMetadata(
  input: unknown,
  path: string,
  errors: ValidationErrorDetail[],
): ArtifactMetadata | null {
  if (!isRecord(input)) {
    errors.push({ field: `${path}.metadata`, message: 'Metadata must be an object', rule: 'type' });
    return null;
  }
  const { name, namespace } = input;
  if (!isNonEmptyString(name)) {
    errors.push({ field: `${path}.metadata.name`, message: 'Metadata name is required', rule: 'required' });
  }
  if (!isNonEmptyString(namespace)) {
    errors.push({ field: `${path}.metadata.namespace`, message: 'Metadata namespace is required', rule: 'required' });
  }
  return isNonEmptyString(name) && isNonEmptyString(namespace) ? { name, namespace } : null;
}

function validateBindings(
  input: unknown,
  schema: readonly FieldSpec[],
  path: string,
  errors: ValidationErrorDetail[],
): ExecutionBindings {
  if (input === undefined) {
    return {};
  }
  if (!isRecord(input)) {
    errors.push({ field: `${path}.bindings`, message: 'Bindings must be an object', rule: 'type' });
    return {};
  }

  const bindings: Partial<Record<ExecutionRole, string>> = {};
  for (const [role, key] of Object.entries(input)) {
    const knownRole = EXECUTION_ROLES.find((r) => r === role);
    if (!knownRole) {
      errors.push({
        field: `${path}.bindings.${role}`,
        message: `Unknown binding role, expected one of ${EXECUTION_ROLES.join(', ')}`,
        rule: 'enum',
      });
      continue;
    }
    if (typeof key !== 'string' || !schema.some((field) => field.key === key)) {
      errors.push({
        field: `${path}.bindings.${role}`,
        message: 'Binding must name a schema key',
        rule: 'reference',
        received: key,
      });
      continue;
    }
    bindings[knownRole] = key;
  }
  return bindings;
}

/**
 * Validate a catalog entry and build its definition
 */
export function validateExperimentDefinition(
  input: unknown,
  path = 'experiment',
): ValidationResult<ExperimentDefinition> {
  const errors: ValidationErrorDetail[] = [];
  const definition = collectExperimentDefinition(input, path, errors);

  if (!definition || errors.length > 0) {
    return invalidResult(ValidationError.multiple(errors, ErrorCode.CATALOG_INVALID));
  }
  return validResult(definition);
}

/**
 * Validate a whole catalog: every entry plus unique experiment IDs
 */
export function validateCatalog(input: unknown): ValidationResult<ExperimentDefinition[]> {
  const errors: ValidationErrorDetail[] = [];

  if (!Array.isArray(input)) {
    errors.push({ field: 'catalog', message: 'Catalog must be a list of experiments', rule: 'type' });
    return invalidResult(ValidationError.multiple(errors, ErrorCode.CATALOG_INVALID));
  }

  if (input.length === 0) {
    errors.push({ field: 'catalog', message: 'Catalog must contain at least one experiment', rule: 'required' });
  }

  const definitions: ExperimentDefinition[] = [];
  const ids = new Set<string>();
  input.forEach((entry: unknown, index) => {
    const definition = collectExperimentDefinition(entry, `catalog[${index}]`, errors);
    if (!definition) return;
    if (ids.has(definition.id)) {
      errors.push({
        field: `catalog[${index}].id`,
        message: `Duplicate experiment id: ${definition.id}`,
        rule: 'unique',
        received: definition.id,
      });
    }
    ids.add(definition.id);
    definitions.push(definition);
  });

  if (errors.length > 0) {
    return invalidResult(ValidationError.multiple(errors, ErrorCode.CATALOG_INVALID));
  }
  return validResult(definitions);
}

function collectExperimentDefinition(
  input: unknown,
  path: string,
  errors: ValidationErrorDetail[],
): ExperimentDefinition | null {
  if (!isRecord(input)) {
    errors.push({ field: path, message: 'Experiment must be an object', rule: 'type' });
    return null;
  }

  const before = errors.length;
  const { id, name, description, apiVersion, documentKind } = input;

  if (typeof id !== 'string' || !EXPERIMENT_ID_PATTERN.test(id)) {
    errors.push({
      field: `${path}.id`,
      message: 'Experiment id must be a lowercase slug starting with a letter',
      rule: 'format',
      received: id,
    });
  }
  if (!isNonEmptyString(name)) {
    errors.push({ field: `${path}.name`, message: 'Experiment name is required', rule: 'required' });
  }
  if (typeof description !== 'string') {
    errors.push({ field: `${path}.description`, message: 'Description must be a string', rule: 'type' });
  }
  if (!isNonEmptyString(apiVersion)) {
    errors.push({ field: `${path}.apiVersion`, message: 'apiVersion is required', rule: 'required' });
  }
  if (!isNonEmptyString(documentKind)) {
    errors.push({ field: `${path}.documentKind`, message: 'documentKind is required', rule: 'required' });
  }

  const metadata = validateMetadata(input.metadata, path, errors);

  const schema: FieldSpec[] = [];
  if (!Array.isArray(input.schema) || input.schema.length === 0) {
    errors.push({ field: `${path}.schema`, message: 'Schema must be a non-empty list of fields', rule: 'required' });
  } else {
    input.schema.forEach((entry: unknown, index) => {
      const field = validateFieldSpec(entry, `${path}.schema[${index}]`, errors);
      if (field) schema.push(field);
    });
    validateSchemaInvariants(schema, path, errors);
  }

  const bindings = validateBindings(input.bindings, schema, path, errors);

  if (errors.length > before || !metadata) {
    return null;
  }

  return {
    id: String(id),
    name: String(name),
    description: String(description),
    apiVersion: String(apiVersion),
    documentKind: String(documentKind),
    metadata,
    bindings,
    schema,
  };
}
