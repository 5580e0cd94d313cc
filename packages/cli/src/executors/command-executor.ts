/**
 * Command executor
 *
 * Pipes the artifact into an external command (by default `kubectl apply -f -`)
 * and streams its output lines as execution events.
 * @module @faultline/cli/executors/command-executor
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { ExecutionEventKind, ExecutionRequest, Executor, ProducedEvent } from '@faultline/shared';
import { ErrorCode, ExecutionError, createServiceLogger, errorMessage, type Logger } from '@faultline/shared';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The parts of a child process the executor uses
 */
export interface ChildProcessLike {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcessLike;

export interface CommandExecutorOptions {
  /** Command and arguments */
  command: readonly string[];
  /** Replaces child_process.spawn, mainly for tests */
  spawn?: SpawnFunction;
  /** Extra environment for the child */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Output that reports a resource being created or changed
 */
const APPLIED_PATTERN = /\b(created|configured)\b/;

/**
 * Classify one line of command output
 */
export function classifyLine(line: string, stream: 'stdout' | 'stderr'): ExecutionEventKind {
  if (stream === 'stdout' && APPLIED_PATTERN.test(line)) {
    return 'chaos-occurred';
  }
  return 'info';
}

interface RunState {
  pending: ProducedEvent[];
  openStreams: number;
  exit: { code: number | null; signal: NodeJS.Signals | null } | null;
  failure: ExecutionError | null;
  lastStderr: string;
  wake: (() => void) | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Command Executor
// ─────────────────────────────────────────────────────────────────────────────

export class CommandExecutor implements Executor {
  readonly name: string;

  private readonly command: readonly string[];
  private readonly spawnProcess: SpawnFunction;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(options: CommandExecutorOptions) {
    this.command = options.command;
    this.name = options.command[0] ?? 'command';
    this.spawnProcess = options.spawn ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
    this.env = options.env ?? {};
    this.logger = options.logger ?? createServiceLogger({ component: 'command-executor' });
  }

  async *execute(request: ExecutionRequest): AsyncIterable<ProducedEvent> {
    const [command, ...args] = this.command;
    if (!command) {
      throw new ExecutionError('No command configured', ErrorCode.EXECUTION_FAILED, {}, this.name);
    }

    const log = this.logger.child({ experimentId: request.experimentId });
    log.info('Spawning command', { command: this.command.join(' ') });

    const child = this.spawnProcess(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: {
        ...process.env,
        ...this.env,
        FAULTLINE_EXPERIMENT: request.experimentId,
        FAULTLINE_KIND: request.documentKind,
        FAULTLINE_ACTION: request.action,
        FAULTLINE_TARGET: request.target,
        FAULTLINE_DURATION: request.duration,
      },
    });

    const state: RunState = {
      pending: [],
      openStreams: 0,
      exit: null,
      failure: null,
      lastStderr: '',
      wake: null,
    };
    const notify = (): void => {
      const wake = state.wake;
      state.wake = null;
      wake?.();
    };

    const follow = (input: Readable | null, stream: 'stdout' | 'stderr'): void => {
      if (!input) return;
      state.openStreams++;
      const lines = readline.createInterface({ input, crlfDelay: Infinity });
      lines.on('line', (line) => {
        const text = line.trimEnd();
        if (text.length === 0) return;
        if (stream === 'stderr') state.lastStderr = text;
        state.pending.push({ text, kind: classifyLine(text, stream) });
        notify();
      });
      lines.on('close', () => {
        state.openStreams--;
        notify();
      });
    };

    follow(child.stdout, 'stdout');
    follow(child.stderr, 'stderr');

    child.on('close', (code, signal) => {
      state.exit = { code, signal };
      notify();
    });
    child.on('error', (err) => {
      state.failure = ExecutionError.fromProducer(err, this.name);
      notify();
    });

    if (child.stdin) {
      child.stdin.on('error', (err: Error) => {
        // The command may exit before reading all of its input; its exit status reports that
        log.debug('Command stdin closed early', { reason: errorMessage(err) });
      });
      child.stdin.end(request.artifact);
    }

    const finished = (): boolean =>
      state.failure !== null || (state.exit !== null && state.openStreams === 0);

    try {
      while (true) {
        const next = state.pending.shift();
        if (next) {
          yield next;
          continue;
        }
        if (finished()) break;
        await new Promise<void>((resolve) => {
          state.wake = resolve;
        });
      }
    } finally {
      if (!finished()) {
        child.kill('SIGTERM');
      }
    }

    if (state.failure) {
      log.error('Command failed to start', state.failure);
      throw state.failure;
    }

    const exit = state.exit;
    if (!exit || exit.code !== 0) {
      const error = ExecutionError.exited(this.name, {
        exitCode: exit?.code ?? null,
        signal: exit?.signal ?? null,
        stderr: state.lastStderr || undefined,
      });
      log.warn('Command exited unsuccessfully', { exitCode: exit?.code, signal: exit?.signal });
      throw error;
    }

    log.info('Command finished');
    yield { text: `${this.name} exited with code 0`, kind: 'success' };
  }
}

/**
 * Create a command executor
 */
export function createCommandExecutor(options: CommandExecutorOptions): CommandExecutor {
  return new CommandExecutor(options);
}
