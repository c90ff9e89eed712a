/**
 * Report Writer
 *
 * Writes the CSV export of an analysis result into a directory.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConnectorError } from '@billing-audit/core';
import { formatCsvReport, reportFileName, type AnalysisResult } from '@billing-audit/audit-core';

export interface WriteReportOptions {
  outDir: string;
  /** Timestamp for the file name and preamble */
  now?: Date;
}

/**
 * Write the report and return its path. The directory is created if needed.
 */
export async function writeReport(
  result: AnalysisResult,
  options: WriteReportOptions
): Promise<string> {
  const now = options.now ?? new Date();
  const filePath = join(options.outDir, reportFileName(now));

  try {
    await mkdir(options.outDir, { recursive: true });
    await writeFile(filePath, formatCsvReport(result, { generatedAt: now }), 'utf-8');
  } catch (error) {
    const errno = error instanceof Error && 'code' in error ? error.code : undefined;
    throw new ConnectorError({
      code: errno === 'EACCES' || errno === 'EPERM' ? 'PERMISSION_DENIED' : 'UNKNOWN',
      message: `Cannot write report to ${filePath}`,
      connectorId: 'report',
      suggestion: 'Check that the output directory is writable or pass another one with --out.',
      cause: error instanceof Error ? error : undefined,
    });
  }

  return filePath;
}
