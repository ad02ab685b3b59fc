/**
 * Runtime configuration from environment variables (and .env via dotenv)
 * CLI flags override every value resolved here.
 */

import { DEFAULT_API_VERSION } from '../graph/export-api.js';
import { normalizeStatus } from '../graph/parse.js';
import { EXPORT_JOB_STATUSES, type ExportJobStatus } from '../graph/types.js';
import { DEFAULT_BACKOFF_MS, DEFAULT_MAX_RETRIES } from '../download/downloader.js';
import { InvalidInputError } from '../utils/errors.js';

export const DEFAULT_OUTPUT_DIR = 'exports';

export interface ExportConfig {
  accessToken?: string;
  tenantId?: string;
  outputDir: string;
  apiVersion: string;
  verbose: boolean;
  maxRetries: number;
  backoffMs: number;
}

export type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseNonNegativeInt(name: string, value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw InvalidInputError.fromInvalidNumber(name, value);
  }
  return parseInt(trimmed, 10);
}

export function parseRetries(value: string): number {
  return parseNonNegativeInt('--max-retries', value);
}

/**
 * Parse a status filter. "all" and blank mean no filter.
 */
export function parseStatus(value: string): ExportJobStatus | undefined {
  const trimmed = value.trim();
  if (trimmed === '' || trimmed.toLowerCase() === 'all') {
    return undefined;
  }
  const status = normalizeStatus(trimmed);
  if (status === null) {
    throw InvalidInputError.fromInvalidStatus(value, EXPORT_JOB_STATUSES);
  }
  return status;
}

export function resolveConfig(env: Env = process.env): ExportConfig {
  const logLevel = nonEmpty(env.WORKPLACE_LOG_LEVEL)?.toUpperCase();
  const retries = nonEmpty(env.WORKPLACE_MAX_RETRIES);
  const backoff = nonEmpty(env.WORKPLACE_RETRY_BACKOFF_MS);

  return {
    accessToken: nonEmpty(env.WORKPLACE_ACCESS_TOKEN) ?? nonEmpty(env.WORKPLACE_TOKEN),
    tenantId: nonEmpty(env.WORKPLACE_TENANT_ID),
    outputDir: nonEmpty(env.WORKPLACE_EXPORT_DIR) ?? DEFAULT_OUTPUT_DIR,
    apiVersion: nonEmpty(env.WORKPLACE_GRAPH_API_VERSION) ?? DEFAULT_API_VERSION,
    verbose: logLevel === 'DEBUG',
    maxRetries: retries === undefined ? DEFAULT_MAX_RETRIES : parseNonNegativeInt('WORKPLACE_MAX_RETRIES', retries),
    backoffMs: backoff === undefined ? DEFAULT_BACKOFF_MS : parseNonNegativeInt('WORKPLACE_RETRY_BACKOFF_MS', backoff),
  };
}
