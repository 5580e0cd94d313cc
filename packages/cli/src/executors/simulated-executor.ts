/**
 * Simulated executor
 *
 * Plays a scripted log of an experiment without touching a cluster.
 * @module @faultline/cli/executors/simulated-executor
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { ExecutionRequest, Executor, ProducedEvent } from '@faultline/shared';

export interface SimulatedExecutorOptions {
  /** Pause before each line */
  delayMs?: number;
  /** Replaces the timer, mainly for tests */
  wait?: (ms: number) => Promise<void>;
}

/**
 * The lines a simulated run prints
 */
export function simulatedScript(request: ExecutionRequest): ProducedEvent[] {
  const action = request.action || 'fault';
  const target = request.target || 'the selected pods';
  const window = request.duration || 'the experiment window';

  return [
    { text: `Validating ${request.documentKind} manifest`, kind: 'info' },
    { text: 'Manifest is valid', kind: 'success' },
    { text: `Applying ${request.documentKind} (simulated, nothing is sent to the cluster)`, kind: 'info' },
    { text: `Injected ${action} on ${target}`, kind: 'chaos-occurred' },
    { text: `Observing targets for ${window}`, kind: 'info' },
    { text: 'Targets recovered', kind: 'success' },
    { text: 'Experiment complete', kind: 'success' },
  ];
}

/**
 * Executor yielding the simulated script with a pause before each line
 */
export class SimulatedExecutor implements Executor {
  readonly name = 'simulated';

  private readonly delayMs: number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: SimulatedExecutorOptions = {}) {
    this.delayMs = options.delayMs ?? 400;
    this.wait = options.wait ?? ((ms) => sleep(ms));
  }

  async *execute(request: ExecutionRequest): AsyncIterable<ProducedEvent> {
    for (const event of simulatedScript(request)) {
      if (this.delayMs > 0) {
        await this.wait(this.delayMs);
      }
      yield event;
    }
  }
}
