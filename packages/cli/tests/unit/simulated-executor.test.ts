/**
 * Unit tests for the simulated executor
 * @module @faultline/cli/tests/unit/simulated-executor
 */

import { describe, it, expect, vi } from 'vitest';
import type { ExecutionRequest, ProducedEvent } from '@faultline/shared';
import { SimulatedExecutor, simulatedScript } from '../../src/executors/simulated-executor.js';

const REQUEST: ExecutionRequest = {
  experimentId: 'network-faults',
  documentKind: 'NetworkChaos',
  action: 'delay',
  target: 'app=web-show',
  duration: '30s',
  artifact: 'kind: NetworkChaos\n',
};

async function collect(events: AsyncIterable<ProducedEvent>): Promise<ProducedEvent[]> {
  const collected: ProducedEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

describe('simulatedScript', () => {
  it('should name the injected fault and its target', () => {
    const script = simulatedScript(REQUEST);

    expect(script).toHaveLength(7);
    expect(script[0]).toEqual({ text: 'Validating NetworkChaos manifest', kind: 'info' });
    expect(script[3]).toEqual({ text: 'Injected delay on app=web-show', kind: 'chaos-occurred' });
    expect(script[4]).toEqual({ text: 'Observing targets for 30s', kind: 'info' });
  });

  it('should fall back to generic wording for unbound roles', () => {
    const script = simulatedScript({ ...REQUEST, action: '', target: '', duration: '' });

    expect(script[3]?.text).toBe('Injected fault on the selected pods');
    expect(script[4]?.text).toBe('Observing targets for the experiment window');
  });

  it('should end successfully without error events', () => {
    const script = simulatedScript(REQUEST);

    expect(script.at(-1)).toEqual({ text: 'Experiment complete', kind: 'success' });
    expect(script.some((event) => event.kind === 'error')).toBe(false);
  });
});

describe('SimulatedExecutor', () => {
  it('should play the script with a pause before each line', async () => {
    const wait = vi.fn((_ms: number) => Promise.resolve());
    const executor = new SimulatedExecutor({ delayMs: 250, wait });

    const events = await collect(executor.execute(REQUEST));

    expect(events).toEqual(simulatedScript(REQUEST));
    expect(wait).toHaveBeenCalledTimes(7);
    expect(wait).toHaveBeenCalledWith(250);
  });

  it('should not pause with a zero delay', async () => {
    const wait = vi.fn((_ms: number) => Promise.resolve());
    const executor = new SimulatedExecutor({ delayMs: 0, wait });

    await collect(executor.execute(REQUEST));

    expect(wait).not.toHaveBeenCalled();
  });

  it('should be named simulated', () => {
    expect(new SimulatedExecutor().name).toBe('simulated');
  });
});
