/**
 * CLI Configuration
 *
 * Handles configuration loading from the config file and environment overrides.
 * @module @faultline/cli/config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  ErrorCode,
  ValidationError,
  errorMessage,
  isLogLevel,
  type LogLevel,
  type ValidationErrorDetail,
} from '@faultline/shared';
import { isOutputFormat, type OutputFormat } from './output.js';

/**
 * Executors the CLI can drive
 */
export type ExecutorKind = 'simulated' | 'command';

export const EXECUTOR_KINDS: readonly ExecutorKind[] = ['simulated', 'command'] as const;

/**
 * Default command the artifact is piped into
 */
export const DEFAULT_COMMAND: readonly string[] = ['kubectl', 'apply', '-f', '-'];

/**
 * CLI configuration structure
 */
export interface CliConfig {
  executor: ExecutorKind;
  /** Command argv for the command executor; the artifact is written to its stdin */
  command: string[];
  /** Pause between simulated log lines */
  simulatedDelayMs: number;
  summarizerUrl?: string;
  /** Bearer token sent to the summarizer */
  summarizerApiKey?: string;
  summarizerTimeoutMs: number;
  /** Catalog file replacing the bundled one */
  catalogPath?: string;
  /** Directory reports are exported to as JSON */
  reportDir?: string;
  /** File the wizard logs to while it owns the terminal */
  logFile: string;
  logLevel: LogLevel;
  defaultOutputFormat: OutputFormat;
}

export type ConfigKey = keyof CliConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'executor',
  'command',
  'simulatedDelayMs',
  'summarizerUrl',
  'summarizerApiKey',
  'summarizerTimeoutMs',
  'catalogPath',
  'reportDir',
  'logFile',
  'logLevel',
  'defaultOutputFormat',
] as const;

/**
 * Environment variables overriding config values
 */
export const ENV_OVERRIDES: ReadonlyArray<readonly [string, ConfigKey]> = [
  ['FAULTLINE_EXECUTOR', 'executor'],
  ['FAULTLINE_COMMAND', 'command'],
  ['FAULTLINE_SUMMARIZER_URL', 'summarizerUrl'],
  ['FAULTLINE_SUMMARIZER_API_KEY', 'summarizerApiKey'],
  ['FAULTLINE_SUMMARIZER_TIMEOUT_MS', 'summarizerTimeoutMs'],
  ['FAULTLINE_CATALOG', 'catalogPath'],
  ['FAULTLINE_REPORT_DIR', 'reportDir'],
  ['LOG_LEVEL', 'logLevel'],
];

type Env = Record<string, string | undefined>;

/**
 * Config directory path
 */
export function getConfigDir(env: Env = process.env): string {
  return env.FAULTLINE_HOME || path.join(os.homedir(), '.faultline');
}

/**
 * Config file path
 */
export function getConfigFile(env: Env = process.env): string {
  return path.join(getConfigDir(env), 'config.json');
}

/**
 * Default configuration
 */
export function defaultConfig(env: Env = process.env): CliConfig {
  return {
    executor: 'simulated',
    command: [...DEFAULT_COMMAND],
    simulatedDelayMs: 400,
    summarizerTimeoutMs: 30_000,
    logFile: path.join(getConfigDir(env), 'faultline.log'),
    logLevel: 'info',
    defaultOutputFormat: 'table',
  };
}

/**
 * Check if a string names a config setting
 */
export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

/**
 * Split a command line on whitespace
 */
export function splitCommand(value: string): string[] {
  return value.split(/\s+/).filter((part) => part.length > 0);
}

function toCount(value: unknown): number | null {
  const parsed = typeof value === 'number'
    ? value
    : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : null;
}

/**
 * Coerce one setting and store it on the target. Strings come from the
 * environment and `config --set`; the file holds JSON values. An empty
 * string clears an optional setting.
 */
function applyConfigValue(
  target: Partial<CliConfig>,
  key: ConfigKey,
  value: unknown,
  source: string = key,
): ValidationErrorDetail | null {
  const invalid = (expected: string): ValidationErrorDetail => ({
    field: source,
    message: `Expected ${expected}`,
    rule: 'format',
    expected,
    received: value,
  });

  switch (key) {
    case 'executor':
      if (value === 'simulated' || value === 'command') {
        target.executor = value;
        return null;
      }
      return invalid(`one of ${EXECUTOR_KINDS.join(', ')}`);

    case 'command': {
      const argv = typeof value === 'string'
        ? splitCommand(value)
        : Array.isArray(value) && value.every((part): part is string => typeof part === 'string')
          ? [...value]
          : [];
      if (argv.length === 0) {
        return invalid('a non-empty command');
      }
      target.command = argv;
      return null;
    }

    case 'simulatedDelayMs':
    case 'summarizerTimeoutMs': {
      const count = toCount(value);
      if (count === null) {
        return invalid('a non-negative integer');
      }
      target[key] = count;
      return null;
    }

    case 'summarizerUrl':
      if (value === '') {
        target.summarizerUrl = undefined;
        return null;
      }
      if (typeof value === 'string' && URL.canParse(value)) {
        target.summarizerUrl = value;
        return null;
      }
      return invalid('a URL');

    case 'summarizerApiKey':
    case 'catalogPath':
    case 'reportDir':
      if (value === '') {
        target[key] = undefined;
        return null;
      }
      if (typeof value === 'string') {
        target[key] = value;
        return null;
      }
      return invalid('a string');

    case 'logFile':
      if (typeof value === 'string' && value !== '') {
        target.logFile = value;
        return null;
      }
      return invalid('a path');

    case 'logLevel':
      if (isLogLevel(value)) {
        target.logLevel = value;
        return null;
      }
      return invalid('one of debug, info, warn, error, fatal');

    case 'defaultOutputFormat':
      if (isOutputFormat(value)) {
        target.defaultOutputFormat = value;
        return null;
      }
      return invalid('one of json, table, plain');
  }
}

/**
 * Read and validate the settings stored in the config file
 */
export function readConfigFile(filePath: string): Partial<CliConfig> {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ValidationError(
      `Config file is not valid JSON: ${filePath}`,
      [{ field: filePath, message: errorMessage(err), rule: 'format' }],
      { path: filePath },
      ErrorCode.INVALID_FORMAT,
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw ValidationError.invalidFormat(filePath, 'a JSON object', parsed);
  }

  const stored: Partial<CliConfig> = {};
  const errors: ValidationErrorDetail[] = [];
  for (const [key, value] of Object.entries(parsed)) {
    if (!isConfigKey(key)) {
      errors.push({ field: key, message: 'Unknown setting', rule: 'schema' });
      continue;
    }
    const problem = applyConfigValue(stored, key, value);
    if (problem) errors.push(problem);
  }

  if (errors.length > 0) {
    throw ValidationError.multiple(errors);
  }
  return stored;
}

/**
 * Collect the settings overridden through environment variables
 */
export function readEnvOverrides(env: Env = process.env): Partial<CliConfig> {
  const overrides: Partial<CliConfig> = {};
  const errors: ValidationErrorDetail[] = [];

  for (const [variable, key] of ENV_OVERRIDES) {
    const value = env[variable];
    if (value === undefined || value === '') continue;
    const problem = applyConfigValue(overrides, key, value, variable);
    if (problem) errors.push(problem);
  }

  if (errors.length > 0) {
    throw ValidationError.multiple(errors);
  }
  return overrides;
}

/**
 * Loads CLI configuration: defaults, then the config file, then the environment
 */
export function loadConfig(env: Env = process.env): CliConfig {
  return {
    ...defaultConfig(env),
    ...readConfigFile(getConfigFile(env)),
    ...readEnvOverrides(env),
  };
}

/**
 * Ensures config directory exists
 */
export function ensureConfigDir(env: Env = process.env): void {
  const dir = getConfigDir(env);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

/**
 * Saves settings to the config file, keeping the ones already stored
 */
export function saveConfig(config: Partial<CliConfig>, env: Env = process.env): Partial<CliConfig> {
  ensureConfigDir(env);
  const filePath = getConfigFile(env);
  const updated = { ...readConfigFile(filePath), ...config };
  fs.writeFileSync(filePath, JSON.stringify(updated, null, 2) + '\n', { mode: 0o600 });
  return updated;
}

/**
 * Apply a `key=value` assignment and save it
 */
export function setConfigValue(assignment: string, env: Env = process.env): Partial<CliConfig> {
  const separator = assignment.indexOf('=');
  const key = separator === -1 ? assignment : assignment.slice(0, separator);
  if (separator === -1) {
    throw ValidationError.invalidFormat('config', 'key=value', assignment);
  }
  if (!isConfigKey(key)) {
    throw ValidationError.unknownField(key);
  }

  const update: Partial<CliConfig> = {};
  const problem = applyConfigValue(update, key, assignment.slice(separator + 1));
  if (problem) {
    throw ValidationError.multiple([problem]);
  }
  // An emptied optional setting is dropped from the file
  if (update[key] === undefined) {
    const stored = readConfigFile(getConfigFile(env));
    delete stored[key];
    ensureConfigDir(env);
    fs.writeFileSync(getConfigFile(env), JSON.stringify(stored, null, 2) + '\n', { mode: 0o600 });
    return stored;
  }
  return saveConfig(update, env);
}
