/**
 * Parse raw API records into typed entities
 * All fallback rules (status derivation, synthesized file names, checksum
 * field aliases) live here rather than at call sites.
 */

import { ProtocolError } from '../utils/errors.js';
import { fallbackFileName, toSafeSegment } from '../utils/paths.js';
import {
  EXPORT_JOB_STATUSES,
  type ExportJob,
  type ExportJobDetails,
  type ExportJobStatus,
  type FileRecord,
  type JsonObject,
} from './types.js';

const DEFAULT_CHECKSUM_ALGORITHM = 'sha256';

const STATUS_ALIASES: Record<string, ExportJobStatus> = {
  running: 'in_progress',
  error: 'failed',
};

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: JsonObject, key: string): string | null {
  const value = record[key];
  if (typeof value === 'string' && value.trim() !== '') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

function readBoolean(record: JsonObject, key: string): boolean | null {
  const value = record[key];
  return typeof value === 'boolean' ? value : null;
}

function readId(raw: unknown, entity: string): { record: JsonObject; id: string } {
  if (!isJsonObject(raw)) {
    throw ProtocolError.fromMalformedBody(entity, 'record is not an object');
  }
  const id = readString(raw, 'id');
  if (id === null) {
    throw ProtocolError.fromMissingField(entity, 'id');
  }
  return { record: raw, id };
}

export function hasRecordId(raw: unknown): boolean {
  return isJsonObject(raw) && readString(raw, 'id') !== null;
}

export function isExportJobStatus(value: string): value is ExportJobStatus {
  return EXPORT_JOB_STATUSES.some((status) => status === value);
}

/**
 * Normalize a server status string ("COMPLETED", "running", ...)
 * @returns null when the value is not a known status
 */
export function normalizeStatus(value: string): ExportJobStatus | null {
  const lowered = value.trim().toLowerCase();
  if (isExportJobStatus(lowered)) {
    return lowered;
  }
  return STATUS_ALIASES[lowered] ?? null;
}

export function parseExportJob(raw: unknown): ExportJob {
  const { record, id } = readId(raw, 'export job');
  const isCompleted = readBoolean(record, 'is_completed');
  const rawStatus = readString(record, 'status');

  let status = rawStatus === null ? null : normalizeStatus(rawStatus);
  if (status === null) {
    if (isCompleted === null) {
      status = 'pending';
    } else {
      status = isCompleted ? 'completed' : 'in_progress';
    }
  }

  return {
    id,
    status,
    createdTime: readString(record, 'created_time'),
    completed: isCompleted ?? status === 'completed',
  };
}

/**
 * File records are validated per file: a record without a usable name is
 * returned with fileName null instead of failing the whole listing.
 */
export function parseFileRecord(raw: unknown): FileRecord {
  const record = isJsonObject(raw) ? raw : {};
  const id = readString(record, 'id');
  const rawName = readString(record, 'file_name');
  const safeName = rawName === null ? '' : toSafeSegment(rawName);

  let fileName: string | null = safeName;
  if (safeName === '') {
    fileName = id === null ? null : fallbackFileName(id);
  }

  return {
    id,
    fileName,
    downloadUrl: readString(record, 'download_url'),
    checksum: readString(record, 'checksum') ?? readString(record, 'sha256'),
    checksumAlgorithm:
      readString(record, 'checksum_algorithm')?.toLowerCase() ?? DEFAULT_CHECKSUM_ALGORITHM,
  };
}

export function parseExportJobDetails(raw: unknown): ExportJobDetails {
  const job = parseExportJob(raw);
  const record = isJsonObject(raw) ? raw : {};

  const rawTypes = record.diy_types;
  const diyTypes: string[] = Array.isArray(rawTypes)
    ? rawTypes.filter((value): value is string => typeof value === 'string')
    : [];

  const total = record.total_number_of_completed_jobs;
  const companyJob = record.company_job;

  return {
    job,
    diyTypes,
    completedSubJobs: typeof total === 'number' ? total : null,
    companyJobId: isJsonObject(companyJob) ? readString(companyJob, 'id') : null,
  };
}
