/**
 * Plain-text rendering of jobs and job details
 */

import type { ExportJob, ExportJobDetails } from '../graph/types.js';

export function formatJobLine(job: ExportJob): string {
  return `${job.id}\t${job.status}\t${job.createdTime ?? ''}`;
}

const JOB_COLUMNS = ['Export ID', 'Status', 'Completed?', 'Created'];

export function renderJobsTable(jobs: ExportJob[]): string {
  if (jobs.length === 0) {
    return 'No export jobs were found.';
  }

  const rows = jobs.map((job) => [job.id, job.status, job.completed ? 'Yes' : 'No', job.createdTime ?? '']);
  const widths = JOB_COLUMNS.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => row[column].length))
  );

  const formatRow = (cells: string[]) =>
    cells.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd();

  return [
    formatRow(JOB_COLUMNS),
    formatRow(widths.map((width) => '-'.repeat(width))),
    ...rows.map(formatRow),
  ].join('\n');
}

export function renderJobSummary(details: ExportJobDetails): string[] {
  const lines = [
    `ID: ${details.job.id}`,
    `Status: ${details.job.status}`,
    `Completed: ${details.job.completed}`,
  ];
  if (details.diyTypes.length > 0) {
    lines.push(`DIY types: ${details.diyTypes.join(', ')}`);
  }
  if (details.completedSubJobs !== null) {
    lines.push(`Completed sub-jobs: ${details.completedSubJobs}`);
  }
  return lines;
}
