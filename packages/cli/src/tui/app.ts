/**
 * Terminal wizard
 *
 * Raw-mode keyboard loop over the wizard controller. The frame is redrawn
 * after every key and whenever the reactive store changes.
 * @module @faultline/cli/tui/app
 */

import * as readline from 'node:readline';
import { effect, stop, type WizardController } from '@faultline/core';
import { ErrorCode, FaultlineError, createFileOutput, setLogOutput } from '@faultline/shared';
import { WizardInput, type KeyPress } from './keys.js';
import { renderWizard } from './screens.js';

const ENTER_SCREEN = '\x1b[?1049h\x1b[?25l';
const LEAVE_SCREEN = '\x1b[?25h\x1b[?1049l';
const CLEAR = '\x1b[H\x1b[2J';

export interface WizardAppOptions {
  controller: WizardController;
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
  /** Log entries go here while the wizard owns the terminal */
  logFile?: string;
}

/**
 * Run the wizard until the operator quits. Resolves after the last
 * background task (run or summary) settled.
 */
export async function runWizardApp(options: WizardAppOptions): Promise<void> {
  const { controller } = options;
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  if (!input.isTTY) {
    throw new FaultlineError('The wizard needs an interactive terminal', ErrorCode.INVALID_INPUT);
  }

  const keys = new WizardInput(controller);
  const draw = (): void => {
    output.write(CLEAR + renderWizard(controller.store, keys.view, output.columns ?? 80) + '\n');
  };

  if (options.logFile) {
    setLogOutput(createFileOutput(options.logFile));
  }
  readline.emitKeypressEvents(input);
  input.setRawMode(true);
  input.resume();
  output.write(ENTER_SCREEN);

  // Re-runs whenever anything the frame reads changes (events, report, notice)
  const runner = effect(draw);

  try {
    await new Promise<void>((resolve) => {
      const onKeypress = (text: string | undefined, key: KeyPress | undefined): void => {
        keys.handle(key ?? { sequence: text });
        if (controller.store.state.quitRequested) {
          input.off('keypress', onKeypress);
          output.off('resize', draw);
          resolve();
          return;
        }
        draw();
      };
      input.on('keypress', onKeypress);
      output.on('resize', draw);
    });
  } finally {
    stop(runner);
    input.setRawMode(false);
    input.pause();
    output.write(LEAVE_SCREEN);
    setLogOutput(null);
  }

  await finishPendingTasks(controller, (text) => output.write(text));
}

/**
 * Wait for background work left after the wizard closed, saying so when
 * there is any
 */
export async function finishPendingTasks(
  controller: WizardController,
  write: (text: string) => void,
): Promise<void> {
  if (controller.hasPendingTasks()) {
    write('Waiting for the experiment summary...\n');
  }
  await controller.settled();
}
