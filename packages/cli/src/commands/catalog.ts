/**
 * Catalog Commands
 *
 * List the experiments of the catalog and show one definition
 * @module @faultline/cli/commands/catalog
 */

import { Command } from 'commander';
import { loadCatalogFile } from '../catalog-file.js';
import { loadConfig } from '../config.js';
import { fail, getOutputFormat, keyValue, output, table } from '../output.js';

/**
 * List experiments
 */
function listHandler(): void {
  try {
    const catalog = loadCatalogFile(loadConfig().catalogPath);
    table(
      catalog.list().map((experiment) => ({
        id: experiment.id,
        name: experiment.name,
        kind: experiment.documentKind,
        fields: experiment.schema.length,
      })),
      [
        { key: 'id', header: 'ID' },
        { key: 'name', header: 'Name' },
        { key: 'kind', header: 'Kind' },
        { key: 'fields', header: 'Fields' },
      ],
    );
  } catch (err) {
    fail('Failed to load the catalog', err);
  }
}

/**
 * Show one experiment and its field schema
 */
function showHandler(id: string): void {
  try {
    const experiment = loadCatalogFile(loadConfig().catalogPath).require(id);

    if (getOutputFormat() === 'json') {
      output(experiment);
      return;
    }

    keyValue({
      ID: experiment.id,
      Name: experiment.name,
      Description: experiment.description,
      Kind: `${experiment.apiVersion} ${experiment.documentKind}`,
      Metadata: `${experiment.metadata.namespace}/${experiment.metadata.name}`,
    });
    console.log();
    table(
      experiment.schema.map((field) => ({
        key: field.key,
        label: field.label,
        kind: field.kind,
        default: field.defaultValue,
        options: field.options?.join(', ') ?? '',
      })),
    );
  } catch (err) {
    fail(`Failed to show experiment ${id}`, err);
  }
}

/**
 * Creates the catalog command group
 */
export function createCatalogCommand(): Command {
  const catalog = new Command('catalog');

  catalog
    .description('List the experiments that can be run')
    .addHelpText('after', `
Examples:
  $ faultline catalog                       List experiments
  $ faultline catalog show network-faults   Show the fields of an experiment
`)
    .action(listHandler);

  catalog
    .command('show <id>')
    .description('Show an experiment and its fields')
    .action(showHandler);

  return catalog;
}
