/**
 * Path utilities and naming policy for the export output layout
 * Destination files live at <outputDir>/<jobId>/<fileName>
 */

import { join } from 'path';

/**
 * Canonical output layout structure
 */
export const OUTPUT_LAYOUT = {
  /** Failure reports */
  LOGS_DIR: '.diy-export/logs',
  /** Suffix of in-flight downloads, renamed onto the destination on success */
  TEMP_SUFFIX: '.tmp',
} as const;

const UNSAFE_SEGMENT_CHARS = /[/\\\u0000-\u001f\u007f]/g;

/**
 * Reduce a server-supplied name to a single safe path segment.
 * Separators and control characters become "_"; "." and ".." are rejected.
 */
export function toSafeSegment(value: string): string {
  const cleaned = value.replace(UNSAFE_SEGMENT_CHARS, '_').trim();
  if (cleaned === '.' || cleaned === '..') {
    return cleaned.replace(/\./g, '_');
  }
  return cleaned;
}

/**
 * File name used when a file record carries none
 */
export function fallbackFileName(fileId: string): string {
  return `file_${toSafeSegment(fileId)}`;
}

/**
 * @returns Directory holding one job's files
 */
export function getJobDir(outputDir: string, jobId: string): string {
  return join(outputDir, toSafeSegment(jobId));
}

export function getDestinationPath(outputDir: string, jobId: string, fileName: string): string {
  return join(getJobDir(outputDir, jobId), toSafeSegment(fileName));
}

export function getTempPath(destinationPath: string): string {
  return `${destinationPath}${OUTPUT_LAYOUT.TEMP_SUFFIX}`;
}

export function getLogsDir(outputDir: string): string {
  return join(outputDir, OUTPUT_LAYOUT.LOGS_DIR);
}

export function getFailureReportPath(outputDir: string, runId: string): string {
  return join(getLogsDir(outputDir), `download-failures-${runId}.json`);
}

/**
 * Sortable, filesystem-safe run identifier
 */
export function generateRunId(now: Date = new Date()): string {
  return now.toISOString().replace(/[:.]/g, '-');
}
