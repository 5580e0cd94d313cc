/**
 * Catalog file loading
 * @module @faultline/cli/catalog-file
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ExperimentCatalog } from '@faultline/core';
import { ErrorCode, FaultlineError, ValidationError, errorMessage } from '@faultline/shared';

/**
 * Catalog shipped with the CLI
 */
export const BUNDLED_CATALOG_PATH = fileURLToPath(new URL('../catalog/experiments.json', import.meta.url));

/**
 * Read, validate and freeze a catalog file. Any invariant violation fails
 * the load as a whole.
 */
export function loadCatalogFile(filePath: string = BUNDLED_CATALOG_PATH): ExperimentCatalog {
  if (!fs.existsSync(filePath)) {
    throw new FaultlineError(`Catalog file not found: ${filePath}`, ErrorCode.CATALOG_INVALID, { path: filePath });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ValidationError(
      `Catalog file is not valid JSON: ${filePath}`,
      [{ field: 'catalog', message: errorMessage(err), rule: 'format' }],
      { path: filePath },
      ErrorCode.CATALOG_INVALID,
    );
  }

  return ExperimentCatalog.load(parsed);
}
