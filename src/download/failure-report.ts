/**
 * Failure report writer for export runs
 * Writes JSON report to <outputDir>/.diy-export/logs/download-failures-<runId>.json
 * Includes manual recovery guidance per failure
 */

import { mkdir, writeFile } from 'fs/promises';
import type { ExportSummary, FileOutcome } from '../core/export.js';
import { describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { getFailureReportPath, getLogsDir } from '../utils/paths.js';

export interface FailureEntry {
  jobId: string;
  /** Empty when the whole job failed before its files were listed */
  fileName: string;
  url?: string;
  destinationPath?: string;
  attempts: number;
  errorMessage: string;
  timestamp: string;
  manualRecovery: string[];
}

export interface FailureSummary {
  tenantId: string;
  jobsCompleted: number;
  jobsSkipped: number;
  jobsFailed: number;
  succeeded: number;
  skipped: number;
  failed: number;
}

export interface FailureReport {
  runId: string;
  timestamp: string;
  summary: FailureSummary;
  failures: FailureEntry[];
}

type FailedFile = Extract<FileOutcome, { status: 'failed' }>;

/**
 * Generate manual recovery guidance for a failure entry
 */
export function generateManualRecovery(failure: Omit<FailureEntry, 'manualRecovery'>): string[] {
  const guidance: string[] = [];

  if (!failure.fileName) {
    guidance.push(`List the files of export ${failure.jobId} again once the API error is resolved`);
  } else if (failure.url) {
    guidance.push(`Download URL (may expire): ${failure.url}`);
  }

  guidance.push('Re-run the export; files already on disk are skipped');

  return guidance;
}

function withRecovery(entry: Omit<FailureEntry, 'manualRecovery'>): FailureEntry {
  return { ...entry, manualRecovery: generateManualRecovery(entry) };
}

/**
 * Collect failed files and failed job listings from an export summary
 */
export function collectFailures(summary: ExportSummary, now: Date = new Date()): FailureEntry[] {
  const timestamp = now.toISOString();
  const entries: FailureEntry[] = [];

  for (const job of summary.jobs) {
    const failedFiles = job.files.filter((file): file is FailedFile => file.status === 'failed');
    for (const file of failedFiles) {
      entries.push(
        withRecovery({
          jobId: file.jobId,
          fileName: file.fileName,
          url: file.url,
          destinationPath: file.destinationPath,
          attempts: file.attempts,
          errorMessage: file.error.message,
          timestamp,
        })
      );
    }

    if (job.error) {
      entries.push(
        withRecovery({
          jobId: job.jobId,
          fileName: '',
          attempts: 0,
          errorMessage: job.error.message,
          timestamp,
        })
      );
    }
  }

  return entries;
}

export function toFailureSummary(summary: ExportSummary): FailureSummary {
  return { tenantId: summary.tenantId, ...summary.counts };
}

/**
 * Write a JSON failure report when downloads fail
 * Handles write errors by logging them; never throws
 *
 * @returns Report path, or null when the write failed
 */
export async function writeFailureReport(
  outputDir: string,
  runId: string,
  summary: FailureSummary,
  failures: FailureEntry[]
): Promise<string | null> {
  const logger = getLogger();

  try {
    await mkdir(getLogsDir(outputDir), { recursive: true });

    const reportPath = getFailureReportPath(outputDir, runId);
    const report: FailureReport = {
      runId,
      timestamp: new Date().toISOString(),
      summary,
      failures,
    };

    await writeFile(reportPath, JSON.stringify(report, null, 2), 'utf-8');

    logger.debug(`Failure report written: ${reportPath}`);
    return reportPath;
  } catch (error) {
    logger.warn(`Failed to write failure report: ${describeError(error)}`);
    return null;
  }
}
