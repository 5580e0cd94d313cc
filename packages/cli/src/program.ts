/**
 * faultline program definition
 * @module @faultline/cli/program
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { ValidationError } from '@faultline/shared';
import { loadConfig } from './config.js';
import { OUTPUT_FORMATS, isOutputFormat, setOutputFormat } from './output.js';
import {
  createCatalogCommand,
  createCheckCommand,
  createConfigCommand,
  createRenderCommand,
  createRunCommand,
  createWizardCommand,
} from './commands/index.js';
import type { ConfirmationPrompt } from './commands/run.js';

/**
 * CLI version
 */
export const VERSION = '0.1.0';

/**
 * CLI program description
 */
const DESCRIPTION = `
faultline

Compose, review and run fault-injection experiments from the terminal.

Commands:
  wizard      Interactive wizard (default)
  catalog     List experiments and show their fields
  render      Print the manifest of an experiment
  check       Read a manifest back into field values
  run         Confirm and run an experiment without the wizard
  config      Show or change settings

Examples:
  $ faultline
  $ faultline catalog
  $ faultline render network-faults --set action=loss
  $ faultline run pod-faults --yes
`;

export interface ProgramOptions {
  /** Where `run` asks for confirmation; the terminal by default */
  prompt?: ConfirmationPrompt;
}

/**
 * Creates and configures the main CLI program
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('faultline')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .option('-o, --output <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`)
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<{ output?: string; color?: boolean }>();

      // Handle --no-color
      if (opts.color === false) {
        chalk.level = 0;
      }

      const format = opts.output ?? loadConfig().defaultOutputFormat;
      if (!isOutputFormat(format)) {
        throw ValidationError.invalidOption('--output', OUTPUT_FORMATS, format);
      }
      setOutputFormat(format);
    });

  program.addCommand(createWizardCommand(), { isDefault: true });
  program.addCommand(createCatalogCommand());
  program.addCommand(createRenderCommand());
  program.addCommand(createCheckCommand());
  program.addCommand(createRunCommand(options.prompt));
  program.addCommand(createConfigCommand());

  return program;
}
