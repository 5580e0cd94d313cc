/**
 * Wires the configured collaborators for a command
 * @module @faultline/cli/runtime
 */

import type { ExperimentCatalog } from '@faultline/core';
import { createServiceLogger, type Executor, type Logger, type Report, type Summarizer } from '@faultline/shared';
import { loadCatalogFile } from './catalog-file.js';
import type { CliConfig } from './config.js';
import { CommandExecutor } from './executors/command-executor.js';
import { SimulatedExecutor } from './executors/simulated-executor.js';
import { exportReport } from './report-export.js';
import { HttpSummarizer } from './summarizers/http-summarizer.js';

export interface Runtime {
  config: CliConfig;
  catalog: ExperimentCatalog;
  executor: Executor;
  summarizer?: Summarizer;
  logger: Logger;
  /** Writes the report to the report directory; resolves with the path, or null when exports are off */
  saveReport: (report: Report) => Promise<string | null>;
}

/**
 * Build the executor named by the config
 */
export function createExecutor(config: CliConfig): Executor {
  switch (config.executor) {
    case 'command':
      return new CommandExecutor({
        command: config.command,
        logger: createServiceLogger({ component: 'command-executor', level: config.logLevel }),
      });
    case 'simulated':
      return new SimulatedExecutor({ delayMs: config.simulatedDelayMs });
  }
}

/**
 * Build the summarizer, when a URL is configured
 */
export function createSummarizer(config: CliConfig): Summarizer | undefined {
  if (!config.summarizerUrl) {
    return undefined;
  }
  return new HttpSummarizer({
    url: config.summarizerUrl,
    timeoutMs: config.summarizerTimeoutMs,
    apiKey: config.summarizerApiKey,
  });
}

/**
 * Load the catalog and create the collaborators for one command
 */
export function createRuntime(config: CliConfig): Runtime {
  const logger = createServiceLogger({ component: 'cli', level: config.logLevel });
  const reportDir = config.reportDir;

  return {
    config,
    catalog: loadCatalogFile(config.catalogPath),
    executor: createExecutor(config),
    summarizer: createSummarizer(config),
    logger,
    saveReport: async (report) => (reportDir ? exportReport(report, reportDir) : null),
  };
}
