/**
 * Report export
 * @module @faultline/cli/report-export
 */

import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { toReportRecord, type Report } from '@faultline/shared';

/**
 * File name of an exported report
 */
export function reportFileName(report: Report): string {
  const stamp = report.completedAt.toISOString().replace(/[:.]/g, '-');
  return `${report.definition.id}-${stamp}.json`;
}

/**
 * Write a report as JSON into a directory, creating it when needed.
 * Resolves with the written path.
 */
export async function exportReport(report: Report, directory: string): Promise<string> {
  await mkdir(directory, { recursive: true });
  const filePath = path.join(directory, reportFileName(report));
  await writeFile(filePath, JSON.stringify(toReportRecord(report), null, 2) + '\n', 'utf-8');
  return filePath;
}
