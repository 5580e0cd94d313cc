/**
 * Unit tests for the wizard screens
 * @module @faultline/cli/tests/unit/screens
 */

import { stripVTControlCharacters } from 'node:util';
import { describe, it, expect } from 'vitest';
import { defaultFieldValues, findField, type ExecutionEvent, type Report } from '@faultline/shared';
import { assembleReport, attachSummary, createWizardController, markSummaryUnavailable } from '@faultline/core';
import { loadCatalogFile } from '../../src/catalog-file.js';
import { SimulatedExecutor } from '../../src/executors/simulated-executor.js';
import {
  KEY_HINTS,
  catalogLines,
  confirmLines,
  eventLine,
  fieldLines,
  renderWizard,
  reportLines,
  runningLines,
  type ViewState,
} from '../../src/tui/screens.js';

const catalog = loadCatalogFile();
const pod = catalog.require('pod-faults');
const network = catalog.require('network-faults');
const podDefaults = defaultFieldValues(pod.schema);

function plain(lines: readonly string[]): string[] {
  return lines.map((line) => stripVTControlCharacters(line));
}

function row(marker: '>' | ' ', label: string, value: string): string {
  return `${marker} ${label.padEnd('Label selectors'.length)}  ${value}`;
}

const EVENTS: ExecutionEvent[] = [
  { sequence: 0, timestamp: 0, text: 'Injected pod-failure on app.kubernetes.io/component=tikv', kind: 'chaos-occurred' },
  { sequence: 1, timestamp: 400, text: 'Experiment complete', kind: 'success' },
];

function podReport(): Report {
  return assembleReport(pod, podDefaults, EVENTS, {
    id: 'report-1',
    artifact: 'kind: PodChaos\n',
    startedAt: new Date('2024-05-01T10:00:00Z'),
    completedAt: new Date('2024-05-01T10:00:30Z'),
  });
}

describe('catalogLines', () => {
  it('should mark the highlighted experiment and preview its manifest', () => {
    const lines = plain(catalogLines(catalog.list(), 0, false));

    expect(lines.slice(0, 10)).toEqual([
      '> Pod Faults',
      '  Network Faults',
      '  Stress Scenarios',
      '',
      'Pod Faults',
      pod.description,
      '',
      'Default manifest:',
      '  apiVersion: chaos-mesh.org/v1alpha1',
      '  kind: PodChaos',
    ]);
    expect(lines.at(-1)).toBe('      app.kubernetes.io/component: tikv');
  });

  it('should follow the highlight', () => {
    const lines = plain(catalogLines(catalog.list(), 2, false));

    expect(lines.slice(0, 3)).toEqual(['  Pod Faults', '  Network Faults', '> Stress Scenarios']);
    expect(lines[4]).toBe('Stress Scenarios');
  });

  it('should append the help panel on request', () => {
    const lines = plain(catalogLines(catalog.list(), 0, true));

    expect(lines).toContain('Help');
    expect(lines.at(-1)).toBe('  q                quit');
  });
});

describe('fieldLines', () => {
  it('should show every field with the cursor and the selected description', () => {
    const lines = plain(fieldLines(pod, podDefaults, 'action', null));

    expect(lines).toEqual([
      row(' ', 'Name', 'pod-failure-example'),
      row(' ', 'Namespace', 'chaos-mesh'),
      row('>', 'Action', 'pod-failure [pod-failure|pod-kill|container-kill]'),
      row(' ', 'Mode', 'one [one|all|fixed|fixed-percent|random-max-percent]'),
      row(' ', 'Duration', '30s'),
      row(' ', 'Label selectors', 'app.kubernetes.io/component=tikv'),
      '',
      'Kind of pod fault to inject',
    ]);
  });

  it('should mark empty values', () => {
    const lines = plain(fieldLines(pod, { ...podDefaults, duration: '' }, 'name', null));

    expect(lines[4]).toBe(row(' ', 'Duration', '(empty)'));
  });

  it('should show the open prompt with the options of an enumerated field', () => {
    const action = findField(pod.schema, 'action');
    expect(action).toBeDefined();
    if (!action) return;

    const lines = plain(fieldLines(pod, podDefaults, 'action', { field: action, buffer: 'pod-k' }));

    expect(lines.slice(6)).toEqual(['', 'Action: pod-k_', 'Options: pod-failure, pod-kill, container-kill']);
  });
});

describe('confirmLines', () => {
  it('should warn about the edited target namespace', () => {
    const lines = plain(confirmLines(pod, { ...podDefaults, namespace: 'staging' }, 'kind: PodChaos\n'));

    expect(lines).toEqual([
      'Running this experiment injects PodChaos faults into namespace staging.',
      'Review the manifest, then press enter to run it.',
      '',
      '  kind: PodChaos',
    ]);
  });

  it('should fall back to the catalog namespace', () => {
    const lines = plain(confirmLines(network, defaultFieldValues(network.schema), 'kind: NetworkChaos\n'));

    expect(lines[0]).toBe('Running this experiment injects NetworkChaos faults into namespace default.');
  });
});

describe('event lines', () => {
  it('should prefix the offset and a marker', () => {
    expect(stripVTControlCharacters(eventLine({ sequence: 3, timestamp: 1250, text: 'Injected delay', kind: 'chaos-occurred' })))
      .toBe('+1.250s ⚡ Injected delay');
    expect(stripVTControlCharacters(eventLine({ sequence: 4, timestamp: 1300, text: 'boom', kind: 'error' })))
      .toBe('+1.300s ✗ boom');
  });

  it('should count streamed events', () => {
    expect(plain(runningLines(EVENTS.slice(0, 1)))).toEqual([
      'Events (1)',
      '  +0.000s ⚡ Injected pod-failure on app.kubernetes.io/component=tikv',
      '',
      'Waiting for output...',
    ]);
  });
});

describe('reportLines', () => {
  it('should list values, events and the summary', () => {
    const lines = plain(reportLines(attachSummary(podReport(), 'One pod failed and was rescheduled.')));

    expect(lines).toEqual([
      'Pod Faults  ● succeeded',
      'Started    2024-05-01T10:00:00.000Z',
      'Completed  2024-05-01T10:00:30.000Z',
      '',
      'Values',
      '  name = pod-failure-example',
      '  namespace = chaos-mesh',
      '  action = pod-failure',
      '  mode = one',
      '  duration = 30s',
      '  selector.labelSelectors = app.kubernetes.io/component=tikv',
      '',
      'Events',
      '  +0.000s ⚡ Injected pod-failure on app.kubernetes.io/component=tikv',
      '  +0.400s ✓ Experiment complete',
      '',
      'Summary  ● ready',
      '  One pod failed and was rescheduled.',
    ]);
  });

  it('should show the placeholders while pending and once unavailable', () => {
    expect(plain(reportLines(podReport())).slice(-2)).toEqual(['Summary  ◐ pending', '  analysis pending']);
    expect(plain(reportLines(markSummaryUnavailable(podReport()))).slice(-2))
      .toEqual(['Summary  ○ unavailable', '  analysis unavailable']);
  });
});

describe('renderWizard', () => {
  function setup() {
    const controller = createWizardController({
      catalog,
      executor: new SimulatedExecutor({ delayMs: 0 }),
      clock: () => 0,
    });
    const view: ViewState = { prompt: null, showHelp: false };
    const frame = (): string[] => stripVTControlCharacters(renderWizard(controller.store, view, 40)).split('\n');
    return { controller, frame };
  }

  it('should frame the catalog with the step title and key hints', () => {
    const { frame } = setup();
    const lines = frame();

    expect(lines[0]).toBe('faultline  1/ Select experiment');
    expect(lines[1]).toBe('─'.repeat(40));
    expect(lines[2]).toBe('> Pod Faults');
    expect(lines.at(-2)).toBe('─'.repeat(40));
    expect(lines.at(-1)).toBe(KEY_HINTS.selecting);
  });

  it('should name the experiment and show notices', () => {
    const { controller, frame } = setup();
    controller.activate();
    controller.select(1);
    controller.select(1);
    controller.submitEdit('explode');

    const lines = frame();

    expect(lines[0]).toBe('faultline  2/ Configure - Pod Faults');
    expect(lines.at(-2)).toBe('! Action: Expected one of pod-failure, pod-kill, container-kill');
    expect(lines.at(-1)).toBe(KEY_HINTS.editing);
  });

  it('should show the report once the run settled', async () => {
    const { controller, frame } = setup();
    controller.activate();
    controller.inject();
    controller.activate();
    await controller.settled();

    const lines = frame();

    expect(lines[0]).toBe('faultline  5/ Report - Pod Faults');
    expect(lines).toContain('  +0.000s ✓ Experiment complete');
    expect(lines.slice(-5, -2)).toEqual(['', 'Summary  ○ unavailable', '  analysis unavailable']);
    expect(lines.at(-1)).toBe(KEY_HINTS.reporting);
  });
});
