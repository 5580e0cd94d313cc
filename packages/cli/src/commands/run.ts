/**
 * Run Command
 *
 * Confirm and run one experiment without the wizard
 * @module @faultline/cli/commands/run
 */

import * as readline from 'node:readline';
import chalk from 'chalk';
import { Command } from 'commander';
import {
  ExecutionPipeline,
  createSession,
  markSummaryUnavailable,
  renderArtifact,
  requestSummary,
  type WizardSession,
} from '@faultline/core';
import { toReportRecord, type ExecutionEvent } from '@faultline/shared';
import { loadConfig } from '../config.js';
import { applyAssignments } from '../edits.js';
import { fail, getOutputFormat, info, output, warn } from '../output.js';
import { createRuntime } from '../runtime.js';
import { eventLine, reportLines } from '../tui/screens.js';
import { collect } from './render.js';

/**
 * Whether a prompt answer means yes
 */
export function isAffirmative(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

/**
 * Ask a yes/no question on the terminal
 */
async function askOnTerminal(message: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(message, (answer) => {
      rl.close();
      resolve(isAffirmative(answer));
    });
  });
}

/**
 * Where the run command asks for confirmation
 */
export interface ConfirmationPrompt {
  /** False when there is no terminal to answer on */
  readonly interactive: boolean;
  ask(message: string): Promise<boolean>;
}

export const terminalPrompt: ConfirmationPrompt = {
  get interactive() {
    return process.stdin.isTTY === true;
  },
  ask: askOnTerminal,
};

export type ConfirmationOutcome = 'confirmed' | 'declined' | 'no-terminal';

export interface ConfirmRunOptions {
  prompt: ConfirmationPrompt;
  executorName: string;
  /** Skip the question */
  yes?: boolean;
  print?: (text: string) => void;
}

/**
 * Show the manifest and ask the operator. The pipeline is confirmed only
 * after a yes, or straight away with `yes` set.
 */
export async function confirmRun(
  pipeline: ExecutionPipeline,
  session: WizardSession,
  options: ConfirmRunOptions,
): Promise<ConfirmationOutcome> {
  const { prompt, executorName, yes = false, print = console.log } = options;

  if (!yes) {
    if (!prompt.interactive) {
      return 'no-terminal';
    }
    print(renderArtifact(session.experiment, session.fieldValues));
    const proceed = await prompt.ask(
      chalk.yellow(`Inject ${session.experiment.documentKind} faults with ${executorName}? (y/N) `),
    );
    if (!proceed) {
      return 'declined';
    }
  }

  pipeline.confirm(session);
  return 'confirmed';
}

/**
 * Run command handler
 */
async function runHandler(
  id: string,
  options: { set: string[]; yes?: boolean },
  prompt: ConfirmationPrompt,
): Promise<void> {
  const json = getOutputFormat() === 'json';

  try {
    const runtime = createRuntime(loadConfig());
    const experiment = runtime.catalog.require(id);
    const session = createSession(experiment, {
      initialValues: applyAssignments(experiment, options.set),
      logger: runtime.logger,
    });

    const pipeline = new ExecutionPipeline({
      executor: runtime.executor,
      logger: runtime.logger,
      onEvent: (event: ExecutionEvent) => {
        if (!json) console.log(eventLine(event));
      },
    });
    const outcome = await confirmRun(pipeline, session, {
      prompt,
      executorName: runtime.executor.name,
      yes: options.yes,
    });
    if (outcome === 'no-terminal') {
      fail(`Refusing to run ${id}`, new Error('No terminal to confirm on; pass --yes'));
    }
    if (outcome === 'declined') {
      info('Cancelled');
      return;
    }

    if (!json) info(`Running ${experiment.name} with the ${runtime.executor.name} executor`);
    const report = await pipeline.run(session);

    if (!json && runtime.summarizer) info('Waiting for the summary...');
    const summarized = runtime.summarizer
      ? await requestSummary(report, runtime.summarizer, {
          timeoutMs: runtime.config.summarizerTimeoutMs,
          logger: runtime.logger,
        })
      : markSummaryUnavailable(report);

    if (json) {
      output(toReportRecord(summarized));
    } else {
      console.log();
      console.log(reportLines(summarized).join('\n'));
    }

    const saved = await runtime.saveReport(summarized);
    if (saved && !json) info(`Report written to ${saved}`);

    if (summarized.outcome === 'failed') {
      if (!json) warn('The experiment ended with an error');
      process.exitCode = 1;
    }
  } catch (err) {
    fail(`Failed to run ${id}`, err);
  }
}

/**
 * Creates the run command
 */
export function createRunCommand(prompt: ConfirmationPrompt = terminalPrompt): Command {
  return new Command('run')
    .description('Confirm and run an experiment, then print its report')
    .argument('<id>', 'Experiment ID')
    .option('-s, --set <key=value>', 'Set a field before running (repeatable)', collect, [])
    .option('-y, --yes', 'Run without asking for confirmation')
    .addHelpText('after', `
Examples:
  $ faultline run pod-faults
  $ faultline run network-faults --set action=loss --yes
  $ FAULTLINE_EXECUTOR=command faultline run stress-scenarios
`)
    .action((id: string, options: { set: string[]; yes?: boolean }) => runHandler(id, options, prompt));
}
