/**
 * Experiment catalog and field schema type definitions
 * @module @faultline/shared/types/experiment
 */

/**
 * How a field accepts input
 */
export type FieldKind =
  | 'free-text'   // Any string without control characters
  | 'enumerated'; // Exactly one of the declared options

/**
 * How a field's string value is written into the artifact
 */
export type FieldFormat =
  | 'text'    // Plain string scalar
  | 'number'  // Number scalar when the value parses as a finite number
  | 'list'    // Sequence of comma separated items
  | 'map';    // Mapping of comma separated name=value pairs

/**
 * Artifact section a field belongs to
 */
export type FieldSection = 'spec' | 'metadata';

/**
 * Declarative description of one editable parameter
 */
export interface FieldSpec {
  /** Dotted path into the output document, unique within the schema */
  key: string;
  /** Human-readable label */
  label: string;
  /** Input kind */
  kind: FieldKind;
  /** Allowed values (enumerated fields only) */
  options?: readonly string[];
  /** Initial value of the field */
  defaultValue: string;
  /**
   * Nested block the field is rendered in. When set, `key` is
   * `<block>.<leaf>` and the leaf is written inside the block mapping.
   */
  block?: string;
  /** Output format (defaults to text) */
  format?: FieldFormat;
  /** Artifact section (defaults to spec) */
  section?: FieldSection;
  /** Longer help text */
  description?: string;
}

/**
 * Ordered field schema of one experiment
 */
export type FieldSchema = readonly FieldSpec[];

/**
 * Current value of every field, keyed by field key, in schema order
 */
export type FieldValues = Readonly<Record<string, string>>;

/**
 * Executor roles that can be bound to schema keys
 */
export type ExecutionRole = 'action' | 'target' | 'duration';

/**
 * Schema keys whose values are passed to the executor and summarizer
 */
export type ExecutionBindings = Readonly<Partial<Record<ExecutionRole, string>>>;

/**
 * Default artifact metadata
 */
export interface ArtifactMetadata {
  name: string;
  namespace: string;
}

/**
 * A named fault-injection scenario with a fixed document kind
 */
export interface ExperimentDefinition {
  /** Catalog slug */
  readonly id: string;
  /** Display name */
  readonly name: string;
  /** One-line description */
  readonly description: string;
  /** Artifact apiVersion */
  readonly apiVersion: string;
  /** Artifact kind */
  readonly documentKind: string;
  /** Default metadata */
  readonly metadata: Readonly<ArtifactMetadata>;
  /** Executor role bindings */
  readonly bindings: ExecutionBindings;
  /** Editable parameters */
  readonly schema: FieldSchema;
}

/**
 * Catalog entry as read from a catalog file, before validation
 */
export interface ExperimentDefinitionInput {
  id?: unknown;
  name?: unknown;
  description?: unknown;
  apiVersion?: unknown;
  documentKind?: unknown;
  metadata?: unknown;
  bindings?: unknown;
  schema?: unknown;
}

/**
 * All field kinds
 */
export const ALL_FIELD_KINDS: readonly FieldKind[] = ['free-text', 'enumerated'] as const;

/**
 * All field formats
 */
export const ALL_FIELD_FORMATS: readonly FieldFormat[] = ['text', 'number', 'list', 'map'] as const;

/**
 * All field sections
 */
export const ALL_FIELD_SECTIONS: readonly FieldSection[] = ['spec', 'metadata'] as const;

/**
 * Metadata keys a field may override
 */
export const METADATA_FIELD_KEYS: readonly (keyof ArtifactMetadata)[] = ['name', 'namespace'] as const;

/**
 * Get the leaf name of a field inside its block
 */
export function getFieldLeaf(field: FieldSpec): string {
  return field.block ? field.key.slice(field.block.length + 1) : field.key;
}

/**
 * Find a field by key
 */
export function findField(schema: FieldSchema, key: string): FieldSpec | undefined {
  return schema.find((field) => field.key === key);
}

/**
 * Build the initial field values of a schema from its defaults
 */
export function defaultFieldValues(schema: FieldSchema): FieldValues {
  const values: Record<string, string> = {};
  for (const field of schema) {
    values[field.key] = field.defaultValue;
  }
  return Object.freeze(values);
}
