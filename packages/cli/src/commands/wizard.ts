/**
 * Wizard Command
 *
 * The interactive terminal wizard (default command)
 * @module @faultline/cli/commands/wizard
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';
import { createWizardController } from '@faultline/core';
import { createServiceLogger, type Report } from '@faultline/shared';
import { loadConfig } from '../config.js';
import { fail, info } from '../output.js';
import { createRuntime } from '../runtime.js';
import { runWizardApp } from '../tui/app.js';

/**
 * Wizard command handler
 */
async function wizardHandler(): Promise<void> {
  try {
    const runtime = createRuntime(loadConfig());
    const { config } = runtime;
    fs.mkdirSync(path.dirname(config.logFile), { recursive: true });

    const exported: string[] = [];
    const controller = createWizardController({
      catalog: runtime.catalog,
      executor: runtime.executor,
      summarizer: runtime.summarizer,
      summaryTimeoutMs: config.summarizerTimeoutMs,
      logger: createServiceLogger({ component: 'wizard', level: config.logLevel }),
      onReport: async (report: Report) => {
        const saved = await runtime.saveReport(report);
        if (saved) {
          exported.push(saved);
          runtime.logger.info('Report exported', { path: saved, experimentId: report.definition.id });
        }
      },
    });

    await runWizardApp({ controller, logFile: config.logFile });

    for (const saved of exported) {
      info(`Report written to ${saved}`);
    }
  } catch (err) {
    fail('Wizard stopped', err);
  }
}

/**
 * Creates the wizard command
 */
export function createWizardCommand(): Command {
  return new Command('wizard')
    .description('Pick, configure, confirm and run an experiment interactively')
    .addHelpText('after', `
Keys:
  up/down or k/j   move      enter   select / edit / run
  i                inject    r       reset field
  b or escape      back      q       quit
`)
    .action(wizardHandler);
}
