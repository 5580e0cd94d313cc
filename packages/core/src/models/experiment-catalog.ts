/**
 * Experiment catalog model
 * Validated, immutable experiment definitions loaded once at startup
 * @module @faultline/core/models/experiment-catalog
 */

import type { ExperimentDefinition } from '@faultline/shared';
import {
  ErrorCode,
  FaultlineError,
  validateCatalog,
  validateExperimentDefinition,
} from '@faultline/shared';

/**
 * Freeze an object graph in place
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate and freeze a single definition. Throws the ValidationError
 * listing every problem.
 */
export function defineExperiment(input: unknown): ExperimentDefinition {
  const result = validateExperimentDefinition(input);
  if (!result.valid) {
    throw result.error;
  }
  return deepFreeze(result.value);
}

/**
 * Read-only experiment catalog. Sessions reference its definitions; they
 * are never copied.
 */
export class ExperimentCatalog {
  private readonly definitions: readonly ExperimentDefinition[];
  private readonly byId: ReadonlyMap<string, ExperimentDefinition>;

  private constructor(definitions: ExperimentDefinition[]) {
    this.definitions = Object.freeze(definitions.map((definition) => deepFreeze(definition)));
    this.byId = new Map(this.definitions.map((definition) => [definition.id, definition]));
  }

  /**
   * Load a catalog from parsed catalog-file contents. Fails fast with a
   * ValidationError on any schema or document invariant violation.
   */
  static load(input: unknown): ExperimentCatalog {
    const result = validateCatalog(input);
    if (!result.valid) {
      throw result.error;
    }
    return new ExperimentCatalog(result.value);
  }

  /**
   * All definitions in catalog order
   */
  list(): readonly ExperimentDefinition[] {
    return this.definitions;
  }

  get size(): number {
    return this.definitions.length;
  }

  get(id: string): ExperimentDefinition | undefined {
    return this.byId.get(id);
  }

  /**
   * Get a definition or throw EXPERIMENT_NOT_FOUND
   */
  require(id: string): ExperimentDefinition {
    const definition = this.byId.get(id);
    if (!definition) {
      throw new FaultlineError(
        `Unknown experiment: ${id}. Available: ${[...this.byId.keys()].join(', ')}`,
        ErrorCode.EXPERIMENT_NOT_FOUND,
        { experimentId: id },
      );
    }
    return definition;
  }
}
