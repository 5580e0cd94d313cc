/**
 * Unit tests for CLI configuration
 * @module @faultline/cli/tests/unit/config
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ErrorCode, ValidationError } from '@faultline/shared';
import {
  DEFAULT_COMMAND,
  defaultConfig,
  getConfigFile,
  loadConfig,
  readConfigFile,
  readEnvOverrides,
  saveConfig,
  setConfigValue,
  splitCommand,
} from '../../src/config.js';

function thrown(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('Expected a validation error');
}

describe('config', () => {
  let home: string;
  let env: Record<string, string | undefined>;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'faultline-config-'));
    env = { FAULTLINE_HOME: home };
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  function writeConfig(contents: string): void {
    fs.writeFileSync(getConfigFile(env), contents);
  }

  // ==========================================================================
  // Loading
  // ==========================================================================

  describe('loadConfig', () => {
    it('should use the defaults without a config file', () => {
      const config = loadConfig(env);

      expect(config).toEqual(defaultConfig(env));
      expect(config.executor).toBe('simulated');
      expect(config.command).toEqual(['kubectl', 'apply', '-f', '-']);
      expect(config.logFile).toBe(path.join(home, 'faultline.log'));
      expect(config.summarizerUrl).toBeUndefined();
    });

    it('should let the file override defaults and the environment override the file', () => {
      writeConfig(JSON.stringify({ executor: 'command', simulatedDelayMs: 10, reportDir: '/var/reports' }));
      env.FAULTLINE_EXECUTOR = 'simulated';
      env.FAULTLINE_COMMAND = 'bash -c cat';

      const config = loadConfig(env);

      expect(config.executor).toBe('simulated');
      expect(config.command).toEqual(['bash', '-c', 'cat']);
      expect(config.simulatedDelayMs).toBe(10);
      expect(config.reportDir).toBe('/var/reports');
    });

    it('should not change the default command', () => {
      env.FAULTLINE_COMMAND = 'cat';
      loadConfig(env);

      expect(DEFAULT_COMMAND).toEqual(['kubectl', 'apply', '-f', '-']);
    });
  });

  describe('readConfigFile', () => {
    it('should reject malformed JSON', () => {
      writeConfig('{ executor: ');

      const error = thrown(() => readConfigFile(getConfigFile(env)));

      expect(error.code).toBe(ErrorCode.INVALID_FORMAT);
    });

    it('should reject a file that is not an object', () => {
      writeConfig('["simulated"]');

      expect(thrown(() => readConfigFile(getConfigFile(env))).code).toBe(ErrorCode.INVALID_FORMAT);
    });

    it('should report every bad setting at once', () => {
      writeConfig(JSON.stringify({ executor: 'remote', colour: true, summarizerTimeoutMs: -1 }));

      const error = thrown(() => readConfigFile(getConfigFile(env)));

      expect(error.code).toBe(ErrorCode.VALIDATION_FAILED);
      expect(error.details.map((detail) => detail.field)).toEqual(['executor', 'colour', 'summarizerTimeoutMs']);
      expect(error.getFieldErrors('colour')[0]?.message).toBe('Unknown setting');
      expect(error.getFieldErrors('executor')[0]?.message).toBe('Expected one of simulated, command');
    });

    it('should accept a command as an argument array', () => {
      writeConfig(JSON.stringify({ command: ['kubectl', '--context', 'staging', 'apply', '-f', '-'] }));

      expect(readConfigFile(getConfigFile(env)).command).toEqual(['kubectl', '--context', 'staging', 'apply', '-f', '-']);
    });
  });

  describe('readEnvOverrides', () => {
    it('should name the variable in errors', () => {
      const error = thrown(() => readEnvOverrides({ FAULTLINE_SUMMARIZER_TIMEOUT_MS: 'soon', LOG_LEVEL: 'loud' }));

      expect(error.hasFieldError('FAULTLINE_SUMMARIZER_TIMEOUT_MS')).toBe(true);
      expect(error.hasFieldError('LOG_LEVEL')).toBe(true);
    });

    it('should skip empty variables', () => {
      expect(readEnvOverrides({ FAULTLINE_EXECUTOR: '', LOG_LEVEL: 'debug' })).toEqual({ logLevel: 'debug' });
    });
  });

  // ==========================================================================
  // Saving
  // ==========================================================================

  describe('setConfigValue', () => {
    it('should save settings next to the ones already stored', () => {
      setConfigValue('summarizerUrl=http://localhost:8080/summarize', env);
      setConfigValue('reportDir=/tmp/reports', env);

      expect(readConfigFile(getConfigFile(env))).toEqual({
        summarizerUrl: 'http://localhost:8080/summarize',
        reportDir: '/tmp/reports',
      });
    });

    it('should coerce numbers', () => {
      expect(setConfigValue('simulatedDelayMs=0', env)).toEqual({ simulatedDelayMs: 0 });
    });

    it('should remove a setting assigned an empty value', () => {
      saveConfig({ summarizerUrl: 'http://localhost:8080/summarize', reportDir: '/tmp/reports' }, env);

      const stored = setConfigValue('summarizerUrl=', env);

      expect(stored).toEqual({ reportDir: '/tmp/reports' });
      expect(readConfigFile(getConfigFile(env))).toEqual({ reportDir: '/tmp/reports' });
    });

    it('should reject malformed assignments', () => {
      expect(thrown(() => setConfigValue('executor', env)).code).toBe(ErrorCode.INVALID_FORMAT);
      expect(thrown(() => setConfigValue('colour=blue', env)).code).toBe(ErrorCode.UNKNOWN_FIELD);
    });

    it('should reject invalid values without writing', () => {
      const error = thrown(() => setConfigValue('summarizerUrl=not a url', env));

      expect(error.details[0]?.expected).toBe('a URL');
      expect(fs.existsSync(getConfigFile(env))).toBe(false);
    });
  });

  describe('splitCommand', () => {
    it('should split on runs of whitespace', () => {
      expect(splitCommand('  kubectl  apply -f - ')).toEqual(['kubectl', 'apply', '-f', '-']);
    });
  });
});
