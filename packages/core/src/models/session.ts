/**
 * Wizard session model
 * @module @faultline/core/models/session
 */

import { randomUUID } from 'node:crypto';
import { shallowRef, type ShallowRef } from '@vue/reactivity';
import type { ExperimentDefinition, FieldSchema, FieldValues, ScreenState } from '@faultline/shared';
import {
  ErrorCode,
  Screens,
  ValidationError,
  defaultFieldValues,
  type Logger,
} from '@faultline/shared';
import { NavigationStack } from '../services/navigation-stack.js';

/**
 * Session creation options
 */
export interface SessionOptions {
  /** Session ID (random UUID by default) */
  id?: string;
  /** Starting values instead of the schema defaults */
  initialValues?: FieldValues;
  /** Back-navigation guard, true while an execution is in flight */
  isLocked?: () => boolean;
  /** Logger */
  logger?: Logger;
}

/**
 * Check that a mapping holds exactly the schema's keys
 */
export function assertSchemaKeys(schema: FieldSchema, values: FieldValues): void {
  const expected = new Set(schema.map((field) => field.key));
  const actual = Object.keys(values);
  const missing = [...expected].filter((key) => !Object.hasOwn(values, key));
  const extra = actual.filter((key) => !expected.has(key));

  if (missing.length > 0 || extra.length > 0) {
    throw new ValidationError(
      'Field values do not match the experiment schema',
      [
        ...missing.map((field) => ({ field, message: 'Missing field value', rule: 'schema' })),
        ...extra.map((field) => ({ field, message: 'Field is not part of the schema', rule: 'schema' })),
      ],
      {},
      ErrorCode.CONSTRAINT_VIOLATION,
    );
  }
}

/**
 * Rebuild a mapping in schema order and freeze it
 */
export function orderBySchema(schema: FieldSchema, values: FieldValues): FieldValues {
  const ordered: Record<string, string> = {};
  for (const field of schema) {
    ordered[field.key] = values[field.key] ?? field.defaultValue;
  }
  return Object.freeze(ordered);
}

/**
 * One operator's run through the wizard for one experiment.
 * Owned by a single wizard flow; discarded on return to the catalog.
 */
export class WizardSession {
  /** Session ID, used as the logging correlation ID */
  readonly id: string;
  /** Experiment definition (catalog reference) */
  readonly experiment: ExperimentDefinition;
  /** Screen history */
  readonly navigation: NavigationStack;
  /** Creation time */
  readonly startedAt: Date;

  private readonly values: ShallowRef<FieldValues>;

  constructor(experiment: ExperimentDefinition, options: SessionOptions = {}) {
    const first = experiment.schema[0];
    if (!first) {
      throw ValidationError.required(`${experiment.id}.schema`);
    }

    this.id = options.id ?? randomUUID();
    this.experiment = experiment;
    this.startedAt = new Date();

    const initial = options.initialValues ?? defaultFieldValues(experiment.schema);
    assertSchemaKeys(experiment.schema, initial);
    this.values = shallowRef(orderBySchema(experiment.schema, initial));

    this.navigation = new NavigationStack(Screens.editing(first.key), {
      isLocked: options.isLocked,
      logger: options.logger,
    });
  }

  /**
   * Current field values (frozen, schema order)
   */
  get fieldValues(): FieldValues {
    return this.values.value;
  }

  /**
   * Current screen
   */
  get screen(): ScreenState {
    return this.navigation.peek();
  }

  /**
   * Replace the field values with the result of an edit
   */
  commit(next: FieldValues): void {
    assertSchemaKeys(this.experiment.schema, next);
    this.values.value = orderBySchema(this.experiment.schema, next);
  }

  /**
   * Frozen copy of the field values at this instant
   */
  snapshot(): FieldValues {
    return Object.freeze({ ...this.values.value });
  }
}

/**
 * Create a session for an experiment
 */
export function createSession(experiment: ExperimentDefinition, options: SessionOptions = {}): WizardSession {
  return new WizardSession(experiment, options);
}
