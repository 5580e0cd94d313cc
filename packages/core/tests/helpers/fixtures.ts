/**
 * Shared fixtures for core unit tests
 * @module @faultline/core/tests/helpers/fixtures
 */

import type { ExecutionRequest, Executor, ProducedEvent, Summarizer, SummaryRequest } from '@faultline/shared';
import { ExperimentCatalog } from '../../src/index.js';

// ============================================================================
// Catalog entries
// ============================================================================

/**
 * Two-field experiment: a free-text name and an enumerated action
 */
export function scenarioInput(): Record<string, unknown> {
  return {
    id: 'scenario',
    name: 'Scenario',
    description: 'Two fields',
    apiVersion: 'chaos-mesh.org/v1alpha1',
    documentKind: 'NetworkChaos',
    metadata: { name: 'scenario', namespace: 'default' },
    bindings: { action: 'action' },
    schema: [
      { key: 'name', label: 'Name', kind: 'free-text', defaultValue: 'x' },
      { key: 'action', label: 'Action', kind: 'enumerated', options: ['delay', 'loss'], defaultValue: 'delay' },
    ],
  };
}

/**
 * Experiment with metadata overrides, nested blocks and every format
 */
export function networkInput(): Record<string, unknown> {
  return {
    id: 'network-faults',
    name: 'Network Faults',
    description: 'Delay or drop traffic',
    apiVersion: 'chaos-mesh.org/v1alpha1',
    documentKind: 'NetworkChaos',
    metadata: { name: 'network-chaos', namespace: 'chaos-testing' },
    bindings: { action: 'action', target: 'selector.labelSelectors', duration: 'duration' },
    schema: [
      { key: 'name', label: 'Name', kind: 'free-text', defaultValue: 'network-delay', section: 'metadata' },
      { key: 'action', label: 'Action', kind: 'enumerated', options: ['delay', 'loss', 'duplicate'], defaultValue: 'delay' },
      { key: 'mode', label: 'Mode', kind: 'enumerated', options: ['one', 'all'], defaultValue: 'one' },
      {
        key: 'selector.namespaces',
        label: 'Namespaces',
        kind: 'free-text',
        defaultValue: 'default',
        block: 'selector',
        format: 'list',
      },
      {
        key: 'selector.labelSelectors',
        label: 'Label selectors',
        kind: 'free-text',
        defaultValue: 'app=web',
        block: 'selector',
        format: 'map',
      },
      { key: 'delay.latency', label: 'Latency', kind: 'free-text', defaultValue: '100ms', block: 'delay' },
      { key: 'delay.jitter', label: 'Jitter', kind: 'free-text', defaultValue: '10ms', block: 'delay' },
      { key: 'duration', label: 'Duration', kind: 'free-text', defaultValue: '30s' },
      { key: 'value', label: 'Value', kind: 'free-text', defaultValue: '1', format: 'number' },
    ],
  };
}

/**
 * Catalog of both fixture experiments, scenario first
 */
export function loadCatalog(): ExperimentCatalog {
  return ExperimentCatalog.load([scenarioInput(), networkInput()]);
}

// ============================================================================
// Executors and summarizers
// ============================================================================

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function createDeferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export interface ScriptedExecutor extends Executor {
  requests: ExecutionRequest[];
}

/**
 * Executor that yields a fixed list of events, then optionally throws.
 * With a gate, it waits on the gate after the first event.
 */
export function scriptedExecutor(
  events: ProducedEvent[],
  options: { failWith?: unknown; gate?: Promise<void> } = {},
): ScriptedExecutor {
  const requests: ExecutionRequest[] = [];
  return {
    name: 'scripted',
    requests,
    async *execute(request: ExecutionRequest): AsyncGenerator<ProducedEvent> {
      requests.push(request);
      for (const [index, event] of events.entries()) {
        yield event;
        if (index === 0 && options.gate) {
          await options.gate;
        }
      }
      if (options.failWith !== undefined) {
        throw options.failWith;
      }
    },
  };
}

export const THREE_EVENTS: ProducedEvent[] = [
  { text: 'validating manifest', kind: 'info' },
  { text: 'fault injected', kind: 'chaos-occurred' },
  { text: 'experiment finished', kind: 'success' },
];

export interface RecordingSummarizer extends Summarizer {
  requests: SummaryRequest[];
}

/**
 * Summarizer answering with a fixed text, or failing
 */
export function fixedSummarizer(answer: string | Error): RecordingSummarizer {
  const requests: SummaryRequest[] = [];
  return {
    name: 'fixed',
    requests,
    async summarize(request: SummaryRequest): Promise<string> {
      requests.push(request);
      if (answer instanceof Error) {
        throw answer;
      }
      return answer;
    },
  };
}

/**
 * Clock that returns the given readings in order, then repeats the last
 */
export function sequenceClock(readings: number[]): () => number {
  let index = 0;
  return () => {
    const reading = readings[Math.min(index, readings.length - 1)] ?? 0;
    index += 1;
    return reading;
  };
}
