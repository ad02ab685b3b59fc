/**
 * Export progress events and the reporter capability the orchestrator reports to
 */

import type { ExportJob } from '../graph/types.js';
import { getLogger, type Logger } from '../utils/logger.js';

export type SubJobKind = 'company' | 'user';

export type FileSkipReason = 'missing-name' | 'missing-url' | 'already-exists';

export type ExportEvent =
  | { type: 'export-incomplete'; exportId: string }
  | { type: 'export-empty'; exportId: string }
  | { type: 'sub-job-started'; kind: SubJobKind; jobId: string }
  | { type: 'job-started'; job: ExportJob }
  | { type: 'job-skipped'; job: ExportJob; reason: string }
  | { type: 'job-failed'; jobId: string; error: Error }
  | { type: 'job-finished'; jobId: string; succeeded: number; skipped: number; failed: number }
  | { type: 'file-downloaded'; jobId: string; fileName: string; destinationPath: string; attempts: number; sizeBytes: number }
  | { type: 'file-skipped'; jobId: string; fileName: string; reason: FileSkipReason }
  | { type: 'file-failed'; jobId: string; fileName: string; error: Error };

export interface ExportReporter {
  report(event: ExportEvent): void;
}

/**
 * Reporter that renders events through the logger
 */
export function createLoggerReporter(logger: Logger = getLogger()): ExportReporter {
  return {
    report(event: ExportEvent): void {
      switch (event.type) {
        case 'export-incomplete':
          logger.warn(`Export job ${event.exportId} is not marked complete yet. Some files may be missing.`);
          break;
        case 'export-empty':
          logger.warn(`No company or user DIY jobs were found for export ${event.exportId}.`);
          break;
        case 'sub-job-started':
          logger.info(`${event.kind === 'company' ? 'Company' : 'User'} job ${event.jobId}`);
          break;
        case 'job-started':
          logger.info(`Export job ${event.job.id}`);
          break;
        case 'job-skipped':
          logger.debug(`Skipping export ${event.job.id}: ${event.reason}`);
          break;
        case 'job-failed':
          logger.error(`Export job ${event.jobId} failed: ${event.error.message}`);
          break;
        case 'job-finished':
          logger.phaseComplete(
            `Job ${event.jobId}`,
            `${event.succeeded} downloaded, ${event.skipped} skipped, ${event.failed} failed`
          );
          break;
        case 'file-downloaded':
          logger.info(`Saved ${event.destinationPath}`);
          break;
        case 'file-skipped':
          if (event.reason === 'missing-name') {
            logger.warn(`Skipping a file of job ${event.jobId} without file_name or id`);
          } else if (event.reason === 'missing-url') {
            logger.warn(`Skipping file ${event.fileName} without download_url`);
          } else {
            logger.info(`File ${event.fileName} already exists, skipping`);
          }
          break;
        case 'file-failed':
          logger.error(`File ${event.fileName} of job ${event.jobId} failed: ${event.error.message}`);
          break;
      }
    },
  };
}
