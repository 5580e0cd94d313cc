/**
 * Unit tests for the experiment catalog and wizard sessions
 * @module @faultline/core/tests/unit/experiment-catalog
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, FaultlineError, ValidationError } from '@faultline/shared';
import { ExperimentCatalog, createSession, defineExperiment } from '../../src/index.js';
import { loadCatalog, networkInput, scenarioInput } from '../helpers/fixtures.js';

function loadError(input: unknown): ValidationError {
  try {
    ExperimentCatalog.load(input);
  } catch (err) {
    if (err instanceof ValidationError) {
      return err;
    }
    throw err;
  }
  throw new Error('Catalog loaded');
}

describe('ExperimentCatalog', () => {
  it('should load definitions in catalog order', () => {
    const catalog = loadCatalog();

    expect(catalog.size).toBe(2);
    expect(catalog.list().map((definition) => definition.id)).toEqual(['scenario', 'network-faults']);
  });

  it('should freeze every definition', () => {
    const definition = loadCatalog().require('network-faults');

    expect(Object.isFrozen(definition)).toBe(true);
    expect(Object.isFrozen(definition.schema)).toBe(true);
    expect(Object.isFrozen(definition.schema[0])).toBe(true);
    expect(Object.isFrozen(definition.metadata)).toBe(true);
  });

  it('should throw EXPERIMENT_NOT_FOUND for an unknown id', () => {
    const catalog = loadCatalog();

    expect(catalog.get('missing')).toBeUndefined();
    expect(() => catalog.require('missing')).toThrow(FaultlineError);
    try {
      catalog.require('missing');
    } catch (err) {
      expect(err instanceof FaultlineError && err.code).toBe(ErrorCode.EXPERIMENT_NOT_FOUND);
    }
  });

  describe('load-time invariants', () => {
    it('should reject duplicate field keys', () => {
      const input = scenarioInput();
      input.schema = [
        { key: 'name', label: 'Name', kind: 'free-text', defaultValue: 'x' },
        { key: 'name', label: 'Again', kind: 'free-text', defaultValue: 'y' },
      ];

      const error = loadError([input]);

      expect(error.code).toBe(ErrorCode.CATALOG_INVALID);
      expect(error.details.map((detail) => detail.message)).toContain('Duplicate field key: name');
    });

    it('should reject empty dotted path segments', () => {
      const input = scenarioInput();
      input.schema = [{ key: 'selector..labels', label: 'Labels', kind: 'free-text', defaultValue: '' }];

      const error = loadError([input]);

      expect(error.hasFieldError('catalog[0].schema[0].key')).toBe(true);
    });

    it('should require options on enumerated fields and a default among them', () => {
      const input = scenarioInput();
      input.schema = [
        { key: 'action', label: 'Action', kind: 'enumerated', defaultValue: 'delay' },
        { key: 'mode', label: 'Mode', kind: 'enumerated', options: ['one', 'all'], defaultValue: 'fixed' },
      ];
      input.bindings = {};

      const error = loadError([input]);

      expect(error.hasFieldError('catalog[0].schema[0].options')).toBe(true);
      expect(error.hasFieldError('catalog[0].schema[1].defaultValue')).toBe(true);
    });

    it('should reject a block that collides with a top-level field', () => {
      const input = networkInput();
      input.schema = [
        { key: 'delay', label: 'Delay', kind: 'free-text', defaultValue: '1s' },
        { key: 'delay.latency', label: 'Latency', kind: 'free-text', defaultValue: '100ms', block: 'delay' },
      ];
      input.bindings = {};

      const error = loadError([input]);

      expect(error.details.some((detail) => detail.rule === 'block')).toBe(true);
    });

    it('should reject a block that runs through a nested field value', () => {
      const input = networkInput();
      input.schema = [
        { key: 'delay.latency', label: 'Latency', kind: 'free-text', defaultValue: '100ms', block: 'delay' },
        { key: 'delay.latency.jitter.ms', label: 'Jitter', kind: 'free-text', defaultValue: '5', block: 'delay.latency.jitter' },
      ];
      input.bindings = {};

      const error = loadError([input]);

      expect(error.details.map((detail) => detail.message)).toEqual([
        'Block delay.latency.jitter collides with nested field delay.latency',
      ]);
    });

    it('should reject bindings that name no schema key', () => {
      const input = scenarioInput();
      input.bindings = { action: 'missing' };

      const error = loadError([input]);

      expect(error.hasFieldError('catalog[0].bindings.action')).toBe(true);
    });

    it('should reject duplicate experiment ids', () => {
      const error = loadError([scenarioInput(), scenarioInput()]);

      expect(error.hasFieldError('catalog[1].id')).toBe(true);
    });

    it('should reject an empty catalog', () => {
      expect(loadError([]).hasFieldError('catalog')).toBe(true);
    });
  });

  it('should define a single experiment', () => {
    const definition = defineExperiment(scenarioInput());

    expect(definition.documentKind).toBe('NetworkChaos');
    expect(definition.bindings).toEqual({ action: 'action' });
  });
});

describe('WizardSession', () => {
  const catalog = loadCatalog();

  it('should start on the first field with the schema defaults', () => {
    const session = createSession(catalog.require('scenario'));

    expect(session.screen).toEqual({ kind: 'editing', fieldKey: 'name' });
    expect(session.fieldValues).toEqual({ name: 'x', action: 'delay' });
    expect(session.navigation.depth).toBe(1);
  });

  it('should reference the catalog definition without copying it', () => {
    const definition = catalog.require('scenario');

    expect(createSession(definition).experiment).toBe(definition);
  });

  it('should keep its values when the navigation stack moves', () => {
    const session = createSession(catalog.require('scenario'));
    session.commit({ name: 'edited', action: 'loss' });

    session.navigation.push({ kind: 'confirming' });
    session.navigation.pop();

    expect(session.fieldValues).toEqual({ name: 'edited', action: 'loss' });
  });

  it('should store committed values in schema order', () => {
    const session = createSession(catalog.require('scenario'));

    session.commit(Object.freeze({ action: 'loss', name: 'reordered' }));

    expect(Object.keys(session.fieldValues)).toEqual(['name', 'action']);
    expect(Object.isFrozen(session.fieldValues)).toBe(true);
  });

  it('should refuse values that do not match the schema keys', () => {
    const session = createSession(catalog.require('scenario'));

    expect(() => session.commit({ name: 'x' })).toThrow(ValidationError);
    expect(() => session.commit({ name: 'x', action: 'delay', extra: '1' })).toThrow(ValidationError);
    expect(session.fieldValues).toEqual({ name: 'x', action: 'delay' });
  });

  it('should hand out a frozen copy as its snapshot', () => {
    const session = createSession(catalog.require('scenario'));

    const snapshot = session.snapshot();
    session.commit({ name: 'later', action: 'loss' });

    expect(snapshot).toEqual({ name: 'x', action: 'delay' });
    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});
