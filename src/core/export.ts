/**
 * Export orchestrator
 * Walks completed jobs, lists each job's files and downloads them under
 * <outputDir>/<jobId>/. One broken file or job never aborts the run:
 * failures are reported and counted, and the walk continues.
 */

import { mkdir } from 'fs/promises';
import {
  downloadFile,
  DEFAULT_MAX_RETRIES,
  type DownloadOptions,
} from '../download/downloader.js';
import type { StreamingTransport } from '../graph/transport.js';
import type {
  CreatedWindow,
  ExportJobDetails,
  ExportJobSource,
  ExportJobStatus,
  ExportSource,
  FileRecord,
} from '../graph/types.js';
import { DownloadError, SetupError, toError } from '../utils/errors.js';
import { getDestinationPath } from '../utils/paths.js';
import {
  createLoggerReporter,
  type ExportReporter,
  type FileSkipReason,
  type SubJobKind,
} from './reporter.js';

/** Label for outcomes of file records that carry neither name nor id */
export const UNNAMED_FILE = '(unnamed)';

export interface JobRunOptions {
  source: ExportSource;
  transport: StreamingTransport;
  outputDir: string;
  maxRetries?: number;
  download?: DownloadOptions;
  reporter?: ExportReporter;
}

export interface DownloadJobOptions extends JobRunOptions {
  jobId: string;
}

export interface MaterializeExportOptions extends JobRunOptions {
  tenantId: string;
  /** Server-side filter; jobs that are not completed are skipped regardless */
  statusFilter?: ExportJobStatus;
  window?: CreatedWindow;
}

export interface DownloadExportOptions extends JobRunOptions {
  source: ExportJobSource;
  exportId: string;
  /** Walk /<exportId>/user_dyi_jobs as well as the company job; default true */
  includeUserJobs?: boolean;
  /** Details the caller already fetched */
  details?: ExportJobDetails;
}

export type FileOutcome =
  | {
      status: 'downloaded';
      jobId: string;
      fileName: string;
      destinationPath: string;
      attempts: number;
      sizeBytes: number;
    }
  | {
      status: 'skipped';
      jobId: string;
      fileName: string;
      reason: FileSkipReason;
    }
  | {
      status: 'failed';
      jobId: string;
      fileName: string;
      url: string;
      destinationPath: string;
      attempts: number;
      error: Error;
    };

export interface JobOutcome {
  jobId: string;
  status: 'finished' | 'failed';
  files: FileOutcome[];
  /** Set when listing the job's files failed */
  error?: Error;
}

export interface ExportCounts {
  succeeded: number;
  skipped: number;
  failed: number;
  jobsCompleted: number;
  jobsSkipped: number;
  jobsFailed: number;
}

export interface ExportSummary {
  tenantId: string;
  jobs: JobOutcome[];
  skippedJobIds: string[];
  counts: ExportCounts;
}

async function processFile(
  options: DownloadJobOptions,
  file: FileRecord,
  reporter: ExportReporter
): Promise<FileOutcome> {
  const { jobId, outputDir, transport } = options;
  const { fileName, downloadUrl } = file;

  if (fileName === null) {
    reporter.report({ type: 'file-skipped', jobId, fileName: UNNAMED_FILE, reason: 'missing-name' });
    return { status: 'skipped', jobId, fileName: UNNAMED_FILE, reason: 'missing-name' };
  }

  if (!downloadUrl) {
    reporter.report({ type: 'file-skipped', jobId, fileName, reason: 'missing-url' });
    return { status: 'skipped', jobId, fileName, reason: 'missing-url' };
  }

  const destinationPath = getDestinationPath(outputDir, jobId, fileName);

  try {
    const result = await downloadFile(
      transport,
      {
        url: downloadUrl,
        destinationPath,
        expectedChecksum: file.checksum,
        checksumAlgorithm: file.checksumAlgorithm,
        maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
      },
      options.download
    );

    if (!result.downloaded) {
      reporter.report({ type: 'file-skipped', jobId, fileName, reason: 'already-exists' });
      return { status: 'skipped', jobId, fileName, reason: 'already-exists' };
    }

    reporter.report({
      type: 'file-downloaded',
      jobId,
      fileName,
      destinationPath,
      attempts: result.attempts,
      sizeBytes: result.sizeBytes,
    });
    return {
      status: 'downloaded',
      jobId,
      fileName,
      destinationPath,
      attempts: result.attempts,
      sizeBytes: result.sizeBytes,
    };
  } catch (caught) {
    const error = toError(caught);
    reporter.report({ type: 'file-failed', jobId, fileName, error });
    return {
      status: 'failed',
      jobId,
      fileName,
      url: downloadUrl,
      destinationPath,
      attempts: error instanceof DownloadError ? error.attempts : 0,
      error,
    };
  }
}

function countFiles(files: FileOutcome[]): { succeeded: number; skipped: number; failed: number } {
  return {
    succeeded: files.filter((f) => f.status === 'downloaded').length,
    skipped: files.filter((f) => f.status === 'skipped').length,
    failed: files.filter((f) => f.status === 'failed').length,
  };
}

/**
 * Download every file of one export job.
 * A listing failure marks the job failed; files handled before it are kept.
 */
export async function downloadJobFiles(options: DownloadJobOptions): Promise<JobOutcome> {
  const reporter = options.reporter ?? createLoggerReporter();
  const { jobId } = options;
  const files: FileOutcome[] = [];

  try {
    for await (const file of options.source.listFiles(jobId)) {
      files.push(await processFile(options, file, reporter));
    }
  } catch (caught) {
    const error = toError(caught);
    reporter.report({ type: 'job-failed', jobId, error });
    return { jobId, status: 'failed', files, error };
  }

  reporter.report({ type: 'job-finished', jobId, ...countFiles(files) });
  return { jobId, status: 'finished', files };
}

export function summarizeJobs(tenantId: string, jobs: JobOutcome[], skippedJobIds: string[]): ExportSummary {
  const files = countFiles(jobs.flatMap((job) => job.files));
  return {
    tenantId,
    jobs,
    skippedJobIds,
    counts: {
      ...files,
      jobsCompleted: jobs.filter((job) => job.status === 'finished').length,
      jobsSkipped: skippedJobIds.length,
      jobsFailed: jobs.filter((job) => job.status === 'failed').length,
    },
  };
}

/**
 * Raised when listing a tenant's jobs fails partway through a run.
 * Carries the summary of the jobs handled before the failure.
 */
export class ExportInterruptedError extends Error {
  readonly summary: ExportSummary;
  readonly reason: Error;

  constructor(summary: ExportSummary, reason: Error) {
    super(`Export interrupted: ${reason.message}`, { cause: reason });
    this.name = 'ExportInterruptedError';
    this.summary = summary;
    this.reason = reason;
  }
}

/**
 * Download an export's company job and user jobs, each under <outputDir>/<jobId>/
 * Failing to fetch the export or list its user jobs propagates.
 */
export async function downloadExportFiles(options: DownloadExportOptions): Promise<ExportSummary> {
  const reporter = options.reporter ?? createLoggerReporter();
  const { source, exportId } = options;

  const details = options.details ?? (await source.fetchJob(exportId));
  if (!details.job.completed) {
    reporter.report({ type: 'export-incomplete', exportId });
  }

  const targets: { kind: SubJobKind; jobId: string }[] = [];
  if (details.companyJobId) {
    targets.push({ kind: 'company', jobId: details.companyJobId });
  }
  if (options.includeUserJobs ?? true) {
    for await (const job of source.listUserJobs(exportId)) {
      targets.push({ kind: 'user', jobId: job.id });
    }
  }

  if (targets.length === 0) {
    reporter.report({ type: 'export-empty', exportId });
    return summarizeJobs('', [], []);
  }

  const jobs: JobOutcome[] = [];
  for (const { kind, jobId } of targets) {
    reporter.report({ type: 'sub-job-started', kind, jobId });
    jobs.push(await downloadJobFiles({ ...options, jobId, reporter }));
  }
  return summarizeJobs('', jobs, []);
}

/**
 * Materialize all completed export jobs of a tenant under outputDir
 * @throws SetupError when outputDir cannot be created
 * @throws ExportInterruptedError when listing the jobs themselves fails
 */
export async function materializeExport(options: MaterializeExportOptions): Promise<ExportSummary> {
  const reporter = options.reporter ?? createLoggerReporter();
  const { source, tenantId, outputDir } = options;

  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw SetupError.fromOutputDir(outputDir, error);
  }

  const jobs: JobOutcome[] = [];
  const skippedJobIds: string[] = [];

  try {
    for await (const job of source.listJobs(tenantId, options.statusFilter, options.window)) {
      if (job.status !== 'completed') {
        skippedJobIds.push(job.id);
        reporter.report({ type: 'job-skipped', job, reason: `status is ${job.status}` });
        continue;
      }

      reporter.report({ type: 'job-started', job });
      jobs.push(await downloadJobFiles({ ...options, jobId: job.id, reporter }));
    }
  } catch (error) {
    throw new ExportInterruptedError(summarizeJobs(tenantId, jobs, skippedJobIds), toError(error));
  }

  return summarizeJobs(tenantId, jobs, skippedJobIds);
}
