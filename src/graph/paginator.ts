/**
 * Cursor-following paginator for Graph list endpoints
 * - Yields each element of `data` in page order, untouched
 * - Query params go on the first request only; `paging.next` is self-contained
 * - A cursor that does not advance is a protocol error
 */

import { ProtocolError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { isJsonObject } from './parse.js';
import type { JsonObject, QueryParams } from './types.js';

export interface JsonSource {
  getJson(url: string, params?: QueryParams): Promise<JsonObject>;
}

function readPage(url: string, payload: JsonObject): { data: unknown[]; next: string | null } {
  const rawData = payload.data;
  let data: unknown[] = [];
  if (Array.isArray(rawData)) {
    data = rawData;
  } else if (rawData !== undefined) {
    throw ProtocolError.fromMalformedBody(url, '"data" is not an array');
  }

  const paging = payload.paging;
  const next = isJsonObject(paging) ? paging.next : undefined;

  return {
    data,
    next: typeof next === 'string' && next !== '' ? next : null,
  };
}

export async function* paginate(
  source: JsonSource,
  initialUrl: string,
  initialParams?: QueryParams
): AsyncGenerator<unknown, void, undefined> {
  const logger = getLogger();
  const followed = new Set<string>();
  let url = initialUrl;
  let params = initialParams;
  let page = 0;

  for (;;) {
    page++;
    logger.debug(`Fetching page ${page} from ${url}`);
    const payload = await source.getJson(url, params);
    const { data, next } = readPage(url, payload);

    for (const record of data) {
      yield record;
    }

    if (next === null) {
      return;
    }

    if (next === url || followed.has(next)) {
      throw ProtocolError.fromRepeatedCursor(next);
    }
    followed.add(next);
    url = next;
    params = undefined;
  }
}

/**
 * Drain an async sequence into an array
 */
export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}
