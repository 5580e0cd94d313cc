/**
 * Config Command
 *
 * Show and change CLI settings
 * @module @faultline/cli/commands/config
 */

import { Command } from 'commander';
import { CONFIG_KEYS, getConfigFile, loadConfig, setConfigValue } from '../config.js';
import { fail, keyValue, output, success } from '../output.js';

/**
 * Settings printed masked
 */
const SECRET_KEYS = new Set(['summarizerApiKey']);

/**
 * Config as shown to the operator
 */
export function describeConfig(config: object): Record<string, unknown> {
  const shown: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config)) {
    shown[key] = SECRET_KEYS.has(key) && value ? '********' : value;
  }
  return shown;
}

function configHandler(options: { show?: boolean; set?: string; path?: boolean }): void {
  try {
    if (options.path) {
      output(getConfigFile());
      return;
    }

    if (options.set) {
      setConfigValue(options.set);
      success(`Saved ${options.set.split('=')[0] ?? options.set} to ${getConfigFile()}`);
      return;
    }

    keyValue(describeConfig(loadConfig()));
  } catch (err) {
    fail('Failed to update the configuration', err);
  }
}

/**
 * Creates the config command
 */
export function createConfigCommand(): Command {
  return new Command('config')
    .description('Manage CLI configuration')
    .option('--show', 'Show current configuration (default)')
    .option('--set <key=value>', `Set a configuration value (${CONFIG_KEYS.join(', ')})`)
    .option('--path', 'Print the config file path')
    .action(configHandler);
}
