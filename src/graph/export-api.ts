/**
 * DIY export endpoints of the Workplace Graph API
 * Listing calls never retry: a failure surfaces to the caller immediately.
 */

import { ProtocolError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { paginate, type JsonSource } from './paginator.js';
import { hasRecordId, parseExportJob, parseExportJobDetails, parseFileRecord } from './parse.js';
import { HttpTransport } from './transport.js';
import type {
  CreatedWindow,
  ExportJob,
  ExportJobDetails,
  ExportJobSource,
  ExportJobStatus,
  FetchLike,
  FileRecord,
  QueryParams,
} from './types.js';

export const DEFAULT_API_VERSION = 'v20.0';
export const GRAPH_BASE_URL = 'https://graph.facebook.com';

const JOB_FIELDS = ['id', 'is_completed', 'created_time', 'company_job'];

export interface GraphLocation {
  apiVersion?: string;
  baseUrl?: string;
}

export function graphUrl(path: string, location: GraphLocation = {}): string {
  const base = (location.baseUrl ?? GRAPH_BASE_URL).replace(/\/+$/, '');
  const version = location.apiVersion ?? DEFAULT_API_VERSION;
  return `${base}/${version}/${path.replace(/^\/+/, '')}`;
}

export interface ExportApiOptions extends GraphLocation {
  transport: JsonSource;
}

export class ExportApi implements ExportJobSource {
  private readonly transport: JsonSource;
  private readonly location: GraphLocation;

  constructor(options: ExportApiOptions) {
    this.transport = options.transport;
    this.location = { apiVersion: options.apiVersion, baseUrl: options.baseUrl };
  }

  private url(path: string): string {
    return graphUrl(path, this.location);
  }

  /**
   * Resolve the tenant (community) id of the token's owner
   */
  async fetchTenantId(): Promise<string> {
    const payload = await this.transport.getJson(this.url('community'));
    const id = payload.id;
    if (typeof id === 'string' && id !== '') {
      return id;
    }
    if (typeof id === 'number') {
      return String(id);
    }
    throw ProtocolError.fromMissingField('community', 'id');
  }

  /**
   * Export jobs of a tenant; status is filtered server-side
   */
  async *listJobs(
    tenantId: string,
    status?: ExportJobStatus,
    window: CreatedWindow = {}
  ): AsyncGenerator<ExportJob, void, undefined> {
    const params: QueryParams = {};
    if (status) params.status = status;
    if (window.startTime) params.start_time = window.startTime;
    if (window.endTime) params.end_time = window.endTime;

    for await (const raw of paginate(this.transport, this.url(`${tenantId}/diy_exports`), params)) {
      yield parseExportJob(raw);
    }
  }

  /**
   * Community-wide jobs, for callers without a tenant id.
   * The endpoint takes no status parameter, so the filter applies client-side.
   */
  async *listCommunityJobs(status?: ExportJobStatus): AsyncGenerator<ExportJob, void, undefined> {
    for await (const raw of paginate(this.transport, this.url('community/work_dyi_jobs'))) {
      const job = parseExportJob(raw);
      if (status === undefined || job.status === status) {
        yield job;
      }
    }
  }

  async *listFiles(jobId: string): AsyncGenerator<FileRecord, void, undefined> {
    getLogger().debug(`Fetching files for export ${jobId}`);
    for await (const raw of paginate(this.transport, this.url(`${jobId}/files`))) {
      yield parseFileRecord(raw);
    }
  }

  /**
   * Per-user DIY jobs of an export; records without an id are ignored
   */
  async *listUserJobs(exportId: string): AsyncGenerator<ExportJob, void, undefined> {
    for await (const raw of paginate(this.transport, this.url(`${exportId}/user_dyi_jobs`))) {
      if (hasRecordId(raw)) {
        yield parseExportJob(raw);
      } else {
        getLogger().debug(`Ignoring a user job of export ${exportId} without an id`);
      }
    }
  }

  async fetchJob(jobId: string, extraFields: string[] = []): Promise<ExportJobDetails> {
    const fields = [...JOB_FIELDS, ...extraFields];
    const payload = await this.transport.getJson(this.url(jobId), { fields: fields.join(',') });
    return parseExportJobDetails(payload);
  }
}

export interface AppTokenOptions extends GraphLocation {
  fetch?: FetchLike;
}

/**
 * Exchange a custom integration's App ID/Secret for an app access token
 */
export async function fetchAppToken(
  appId: string,
  appSecret: string,
  options: AppTokenOptions = {}
): Promise<string> {
  const transport = new HttpTransport({ fetch: options.fetch, timeoutMs: 30_000 });
  const payload = await transport.getJson(graphUrl('oauth/access_token', options), {
    grant_type: 'client_credentials',
    client_id: appId,
    client_secret: appSecret,
  });

  const token = payload.access_token;
  if (typeof token !== 'string' || token === '') {
    throw ProtocolError.fromMissingField('token', 'access_token');
  }
  return token;
}
