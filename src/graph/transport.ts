/**
 * Authenticated HTTP transport for the Graph API
 * - Bearer credential and User-Agent on every request
 * - JSON decoding with typed error mapping
 * - Streaming open for file downloads (body left unread)
 */

import { ApiError, ProtocolError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { isJsonObject } from './parse.js';
import type { FetchLike, JsonObject, QueryParams } from './types.js';

export const DEFAULT_USER_AGENT = 'WorkplaceDiyExport/1.0';
export const DEFAULT_JSON_TIMEOUT_MS = 60_000;

export interface TransportOptions {
  /** Omit for unauthenticated calls such as the app token exchange */
  accessToken?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  userAgent?: string;
}

export interface StreamOptions {
  signal?: AbortSignal;
}

/**
 * Capability the download engine needs
 */
export interface StreamingTransport {
  openStream(url: string, options?: StreamOptions): Promise<Response>;
}

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params || Object.keys(params).length === 0) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

/**
 * Extract `error.message` from a Graph error body, if there is one
 */
function extractErrorMessage(body: string): string | null {
  try {
    const parsed: unknown = JSON.parse(body);
    const errorBody = isJsonObject(parsed) ? parsed.error : undefined;
    if (isJsonObject(errorBody)) {
      const message = errorBody.message;
      if (typeof message === 'string' && message !== '') {
        return message;
      }
    }
  } catch {
    // Non-JSON error bodies fall back to the status text
    return null;
  }
  return null;
}

async function toApiError(response: Response): Promise<ApiError> {
  let body = '';
  try {
    body = await response.text();
  } catch (error) {
    getLogger().debug(`Could not read error body: ${describeError(error)}`);
  }
  const statusText = response.statusText || `HTTP ${response.status}`;
  return new ApiError(extractErrorMessage(body) ?? statusText, response.status);
}

export class HttpTransport implements StreamingTransport {
  private readonly accessToken?: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: TransportOptions = {}) {
    this.accessToken = options.accessToken;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_JSON_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent };
    if (this.accessToken) {
      headers.Authorization = `Bearer ${this.accessToken}`;
    }
    return headers;
  }

  private async send(url: string, signal?: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: 'GET', headers: this.headers(), signal });
    } catch (error) {
      throw ApiError.fromNetworkFailure(url, error);
    }

    if (!response.ok) {
      throw await toApiError(response);
    }
    return response;
  }

  /**
   * GET a JSON object
   * @throws ApiError on non-2xx or network failure, ProtocolError on a malformed body
   */
  async getJson(url: string, params?: QueryParams): Promise<JsonObject> {
    const target = buildUrl(url, params);
    getLogger().debug(`GET ${target}`);

    const response = await this.send(target, AbortSignal.timeout(this.timeoutMs));

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw ApiError.fromNetworkFailure(target, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw ProtocolError.fromMalformedBody(target, describeError(error));
    }

    if (!isJsonObject(parsed)) {
      throw ProtocolError.fromMalformedBody(target, 'expected a JSON object');
    }
    return parsed;
  }

  /**
   * Open a GET whose body the caller consumes
   */
  async openStream(url: string, options: StreamOptions = {}): Promise<Response> {
    getLogger().debug(`GET (stream) ${url}`);
    return this.send(url, options.signal);
  }
}
