/**
 * Typed entities for the DIY export API
 * Raw payloads are parsed into these at the boundary (see parse.ts)
 */

export const EXPORT_JOB_STATUSES = ['pending', 'in_progress', 'completed', 'failed'] as const;

export type ExportJobStatus = (typeof EXPORT_JOB_STATUSES)[number];

export type JsonObject = Record<string, unknown>;

export interface ExportJob {
  id: string;
  status: ExportJobStatus;
  /** ISO-8601 creation time as sent by the server */
  createdTime: string | null;
  completed: boolean;
}

export interface ExportJobDetails {
  job: ExportJob;
  diyTypes: string[];
  completedSubJobs: number | null;
  companyJobId: string | null;
}

export interface FileRecord {
  id: string | null;
  /**
   * Safe single path segment; synthesized from id when the server sends none.
   * null when the record has neither, and the file is skipped.
   */
  fileName: string | null;
  /** null means the file is skipped, not failed */
  downloadUrl: string | null;
  checksum: string | null;
  checksumAlgorithm: string;
}

export interface CreatedWindow {
  /** Only jobs created after this ISO-8601 timestamp */
  startTime?: string;
  /** Only jobs created before this ISO-8601 timestamp */
  endTime?: string;
}

/**
 * Listing capability the orchestrator depends on
 */
export interface ExportSource {
  listJobs(tenantId: string, status?: ExportJobStatus, window?: CreatedWindow): AsyncIterable<ExportJob>;
  listFiles(jobId: string): AsyncIterable<FileRecord>;
}

/**
 * Adds the per-export traversal: an export's company job and its user jobs
 */
export interface ExportJobSource extends ExportSource {
  fetchJob(jobId: string, extraFields?: string[]): Promise<ExportJobDetails>;
  listUserJobs(exportId: string): AsyncIterable<ExportJob>;
}

export type QueryParams = Record<string, string>;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
