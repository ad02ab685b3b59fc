/**
 * Authenticated API session and end-of-run reporting shared by commands and the wizard
 */

import { ExportInterruptedError, type ExportSummary } from '../core/export.js';
import { collectFailures, toFailureSummary, writeFailureReport } from '../download/failure-report.js';
import { ExportApi } from '../graph/export-api.js';
import { HttpTransport } from '../graph/transport.js';
import type { FetchLike } from '../graph/types.js';
import { getLogger } from '../utils/logger.js';
import { generateRunId } from '../utils/paths.js';

export interface Session {
  api: ExportApi;
  transport: HttpTransport;
}

export function createSession(token: string, apiVersion: string, fetchImpl?: FetchLike): Session {
  const transport = new HttpTransport({ accessToken: token, fetch: fetchImpl });
  return { api: new ExportApi({ transport, apiVersion }), transport };
}

/**
 * Log the summary and persist a failure report when anything failed
 */
async function reportOutcome(summary: ExportSummary, outputDir: string, complete = true): Promise<void> {
  const logger = getLogger();
  const { counts } = summary;

  logger.summary({
    jobs: { completed: counts.jobsCompleted, skipped: counts.jobsSkipped, failed: counts.jobsFailed },
    files: { succeeded: counts.succeeded, skipped: counts.skipped, failed: counts.failed },
  });

  const failures = collectFailures(summary);
  if (failures.length === 0) {
    if (complete) logger.phaseComplete('Download');
    return;
  }

  const reportPath = await writeFailureReport(outputDir, generateRunId(), toFailureSummary(summary), failures);
  if (reportPath) {
    logger.warn(`${failures.length} failure(s) recorded in ${reportPath}`);
  }
}

/**
 * Run an export and report its outcome. An interrupted run still reports
 * the jobs it handled before its error is rethrown.
 */
export async function runAndReport(outputDir: string, run: () => Promise<ExportSummary>): Promise<void> {
  let summary: ExportSummary;
  try {
    summary = await run();
  } catch (error) {
    if (!(error instanceof ExportInterruptedError)) throw error;
    await reportOutcome(error.summary, outputDir, false);
    throw error.reason;
  }
  await reportOutcome(summary, outputDir);
}
