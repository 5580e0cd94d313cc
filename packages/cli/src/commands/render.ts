/**
 * Render Commands
 *
 * Print the manifest of an experiment, or read one back
 * @module @faultline/cli/commands/render
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import { parseArtifact, renderArtifact } from '@faultline/core';
import { loadCatalogFile } from '../catalog-file.js';
import { loadConfig } from '../config.js';
import { applyAssignments } from '../edits.js';
import { fail, getOutputFormat, keyValue, output, success } from '../output.js';

/**
 * Collect a repeatable option
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Print the artifact for the given field values
 */
function renderHandler(id: string, options: { set: string[] }): void {
  try {
    const experiment = loadCatalogFile(loadConfig().catalogPath).require(id);
    const values = applyAssignments(experiment, options.set);
    const artifact = renderArtifact(experiment, values);

    if (getOutputFormat() === 'json') {
      output({ experiment: experiment.id, values, artifact });
    } else {
      process.stdout.write(artifact);
    }
  } catch (err) {
    fail(`Failed to render ${id}`, err);
  }
}

/**
 * Read a manifest file back into field values
 */
function checkHandler(id: string, file: string): void {
  try {
    const experiment = loadCatalogFile(loadConfig().catalogPath).require(id);
    const result = parseArtifact(experiment, fs.readFileSync(file, 'utf-8'));
    if (!result.valid) {
      fail(`${file} does not match ${experiment.name}`, result.error);
    }

    if (getOutputFormat() === 'json') {
      output({ experiment: experiment.id, values: result.value });
      return;
    }
    success(`${file} is a valid ${experiment.documentKind} manifest`);
    keyValue({ ...result.value });
  } catch (err) {
    fail(`Failed to check ${file}`, err);
  }
}

/**
 * Creates the render command
 */
export function createRenderCommand(): Command {
  return new Command('render')
    .description('Print the manifest of an experiment')
    .argument('<id>', 'Experiment ID')
    .option('-s, --set <key=value>', 'Set a field before rendering (repeatable)', collect, [])
    .addHelpText('after', `
Examples:
  $ faultline render network-faults
  $ faultline render network-faults --set action=loss --set duration=1m
`)
    .action(renderHandler);
}

/**
 * Creates the check command
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Read a manifest file back into the fields of an experiment')
    .argument('<id>', 'Experiment ID')
    .argument('<file>', 'Manifest file')
    .action(checkHandler);
}
