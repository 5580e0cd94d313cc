/**
 * Artifact renderer
 * Turns an experiment and its field values into the manifest text
 * @module @faultline/core/services/artifact-renderer
 */

import { parse, stringify, type CreateNodeOptions, type ToStringOptions } from 'yaml';
import type { ExperimentDefinition, FieldSpec, FieldValues, ValidationResult } from '@faultline/shared';
import {
  ErrorCode,
  FaultlineError,
  ValidationError,
  errorMessage,
  getFieldLeaf,
  invalidResult,
  toCanonicalNumber,
  validResult,
  type ValidationErrorDetail,
} from '@faultline/shared';

/**
 * Mapping node of the artifact tree. Maps keep insertion order for every
 * key, including integer-like ones.
 */
export interface ArtifactNode extends Map<string, ArtifactValue> {}

/**
 * Value of an artifact node
 */
export type ArtifactValue = string | number | string[] | ArtifactNode;

/**
 * Fixed serializer options; output must be byte-stable
 */
const YAML_OPTIONS: CreateNodeOptions & ToStringOptions = {
  indent: 2,
  lineWidth: 0,
  minContentWidth: 0,
  aliasDuplicateObjects: false,
};

function splitItems(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Convert a field's string value to its artifact representation
 */
export function toArtifactValue(field: FieldSpec, value: string): ArtifactValue {
  switch (field.format ?? 'text') {
    case 'number': {
      const canonical = toCanonicalNumber(value);
      return canonical === null ? value : Number(canonical);
    }
    case 'list':
      return splitItems(value);
    case 'map': {
      const entries: ArtifactNode = new Map();
      for (const item of splitItems(value)) {
        const separator = item.indexOf('=');
        const name = separator === -1 ? item : item.slice(0, separator).trim();
        const entry = separator === -1 ? '' : item.slice(separator + 1).trim();
        entries.set(name, entry);
      }
      return entries;
    }
    case 'text':
    default:
      return value;
  }
}

/**
 * Find or create the nested mapping addressed by a dotted block path
 */
function resolveBlock(spec: ArtifactNode, block: string): ArtifactNode {
  let node = spec;
  for (const segment of block.split('.')) {
    const existing = node.get(segment);
    if (existing === undefined) {
      const created: ArtifactNode = new Map();
      node.set(segment, created);
      node = created;
    } else if (existing instanceof Map) {
      node = existing;
    } else {
      // Catalog validation rules this out
      throw new FaultlineError(
        `Block ${block} collides with the value at ${segment}`,
        ErrorCode.INTERNAL,
        { block },
      );
    }
  }
  return node;
}

/**
 * Build the artifact tree: apiVersion, kind, metadata, then the spec in
 * schema order. A block is placed where its first field appears.
 */
export function buildArtifact(experiment: ExperimentDefinition, fieldValues: FieldValues): ArtifactNode {
  const metadata: ArtifactNode = new Map([
    ['name', experiment.metadata.name],
    ['namespace', experiment.metadata.namespace],
  ]);
  const spec: ArtifactNode = new Map();

  for (const field of experiment.schema) {
    const value = fieldValues[field.key] ?? field.defaultValue;

    if (field.section === 'metadata') {
      metadata.set(field.key, value);
      continue;
    }

    const target = field.block ? resolveBlock(spec, field.block) : spec;
    target.set(getFieldLeaf(field), toArtifactValue(field, value));
  }

  return new Map<string, ArtifactValue>([
    ['apiVersion', experiment.apiVersion],
    ['kind', experiment.documentKind],
    ['metadata', metadata],
    ['spec', spec],
  ]);
}

/**
 * Render the artifact text. Pure: the same experiment and values always
 * produce the same bytes.
 */
export function renderArtifact(experiment: ExperimentDefinition, fieldValues: FieldValues): string {
  return stringify(buildArtifact(experiment, fieldValues), YAML_OPTIONS);
}

function scalarToString(value: unknown): string | null {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return null;
}

/**
 * Convert a parsed artifact value back to a field's string value
 */
export function fromArtifactValue(field: FieldSpec, value: unknown): string | null {
  switch (field.format ?? 'text') {
    case 'list':
      if (value === null) return '';
      if (!Array.isArray(value)) return null;
      {
        const items = value.map(scalarToString);
        return items.every((item): item is string => item !== null) ? items.join(',') : null;
      }
    case 'map':
      if (value === null) return '';
      if (!(value instanceof Map)) return null;
      {
        const pairs: string[] = [];
        for (const [name, entry] of value) {
          const nameText = scalarToString(name);
          const entryText = scalarToString(entry);
          if (nameText === null || entryText === null) return null;
          pairs.push(`${nameText}=${entryText}`);
        }
        return pairs.join(',');
      }
    case 'number':
    case 'text':
    default:
      return scalarToString(value);
  }
}

function readNode(node: unknown, key: string): unknown {
  return node instanceof Map ? node.get(key) : undefined;
}

function hasNode(node: unknown, key: string): boolean {
  return node instanceof Map && node.has(key);
}

/**
 * Parse a rendered artifact back into field values.
 *
 * Accepts documents shaped like `renderArtifact` output; apiVersion and
 * kind must match the experiment.
 */
export function parseArtifact(experiment: ExperimentDefinition, text: string): ValidationResult<FieldValues> {
  let root: unknown;
  try {
    root = parse(text, { mapAsMap: true });
  } catch (err) {
    return invalidResult(ValidationError.invalidFormat('artifact', 'a YAML document', errorMessage(err)));
  }

  if (!(root instanceof Map)) {
    return invalidResult(ValidationError.invalidFormat('artifact', 'a YAML mapping', typeof root));
  }

  const errors: ValidationErrorDetail[] = [];
  const apiVersion = root.get('apiVersion');
  if (apiVersion !== experiment.apiVersion) {
    errors.push({
      field: 'apiVersion',
      message: `Expected ${experiment.apiVersion}`,
      rule: 'match',
      expected: experiment.apiVersion,
      received: apiVersion,
    });
  }
  const kind = root.get('kind');
  if (kind !== experiment.documentKind) {
    errors.push({
      field: 'kind',
      message: `Expected ${experiment.documentKind}`,
      rule: 'match',
      expected: experiment.documentKind,
      received: kind,
    });
  }

  const metadata = root.get('metadata');
  const spec = root.get('spec');
  const values: Record<string, string> = {};

  for (const field of experiment.schema) {
    let container: unknown;
    if (field.section === 'metadata') {
      container = metadata;
    } else if (field.block) {
      container = field.block.split('.').reduce<unknown>((node, segment) => readNode(node, segment), spec);
    } else {
      container = spec;
    }

    const leaf = getFieldLeaf(field);
    if (!hasNode(container, leaf)) {
      errors.push({ field: field.key, message: 'Field is missing from the artifact', rule: 'required' });
      continue;
    }

    const value = fromArtifactValue(field, readNode(container, leaf));
    if (value === null) {
      errors.push({
        field: field.key,
        message: `Value does not match the ${field.format ?? 'text'} format`,
        rule: 'format',
        expected: field.format ?? 'text',
      });
      continue;
    }
    values[field.key] = value;
  }

  if (errors.length > 0) {
    return invalidResult(ValidationError.multiple(errors));
  }
  return validResult(Object.freeze(values));
}
