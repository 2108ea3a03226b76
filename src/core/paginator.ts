/**
 * Pagination over the metadata and streaming APIs
 *
 * Both protocols are exposed as async generators so a caller can work on the
 * first page before the next one is requested. Errors from a page fetch end
 * the iteration immediately.
 */

import {
  CursorPage,
  QueryParams,
  RawRecord,
  StreamFormat,
  StreamPage,
} from '../types';
import { ResponseHandler } from '../utils/response-handler';

/**
 * Response header carrying the streaming API's continuation token.
 */
export const NEXT_PAGE_TOKEN_HEADER = 'X-Rune-Next-Page-Token';

/**
 * Request parameter that carries the page token back to the API.
 */
export const PAGE_TOKEN_PARAM = 'page_token';

export type CursorFetcher<T> = (
  cursor: string | null
) => Promise<CursorPage<T>>;

/**
 * Follow end cursors until the API stops returning one. Empty pages in the
 * middle of a listing are passed through.
 */
export async function* paginateCursor<T>(
  fetchPage: CursorFetcher<T>
): AsyncGenerator<T[], void, undefined> {
  let cursor: string | null = null;

  do {
    const page: CursorPage<T> = await fetchPage(cursor);
    yield page.items;
    cursor = page.endCursor ? page.endCursor : null;
  } while (cursor);
}

export async function* iterateCursor<T>(
  fetchPage: CursorFetcher<T>
): AsyncGenerator<T, void, undefined> {
  for await (const items of paginateCursor(fetchPage)) {
    yield* items;
  }
}

export async function collectCursor<T>(fetchPage: CursorFetcher<T>): Promise<T[]> {
  const collected: T[] = [];
  for await (const items of paginateCursor(fetchPage)) {
    collected.push(...items);
  }
  return collected;
}

export interface StreamPaginationOptions {
  format?: StreamFormat;
}

export type StreamPageFetcher = (params: QueryParams) => Promise<StreamPage>;

function headerValue(
  headers: Record<string, string>,
  name: string
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

function ordinal(value: unknown): number {
  return typeof value === 'number' && Number.isInteger(value) ? value : 0;
}

export function paginateStream(
  fetchPage: StreamPageFetcher,
  params: QueryParams,
  options: StreamPaginationOptions & { format: 'json' }
): AsyncGenerator<RawRecord, void, undefined>;
export function paginateStream(
  fetchPage: StreamPageFetcher,
  params: QueryParams,
  options?: StreamPaginationOptions & { format?: 'csv' }
): AsyncGenerator<string, void, undefined>;
export function paginateStream(
  fetchPage: StreamPageFetcher,
  params: QueryParams,
  options?: StreamPaginationOptions
): AsyncGenerator<string | RawRecord, void, undefined>;
export function paginateStream(
  fetchPage: StreamPageFetcher,
  params: QueryParams,
  options: StreamPaginationOptions = {}
): AsyncGenerator<string | RawRecord, void, undefined> {
  return options.format === 'json'
    ? paginateJson(fetchPage, params)
    : paginateCsv(fetchPage, params);
}

/**
 * CSV pages: a token header continues with the token; without one, a
 * non-empty body continues with the next ordinal page and an empty body ends
 * the listing.
 */
async function* paginateCsv(
  fetchPage: StreamPageFetcher,
  initialParams: QueryParams
): AsyncGenerator<string, void, undefined> {
  const params: QueryParams = { ...initialParams };
  // kept apart from params so the ordinal stays in step while tokens are in use
  let page = ordinal(params['page']);

  for (;;) {
    const response = await fetchPage({ ...params });
    const token = headerValue(response.headers, NEXT_PAGE_TOKEN_HEADER);

    if (response.body) {
      yield response.body;
    }

    if (token === undefined && !response.body) {
      return;
    }

    page += 1;
    if (token !== undefined) {
      params[PAGE_TOKEN_PARAM] = token;
      delete params['page'];
    } else {
      params['page'] = page;
      delete params[PAGE_TOKEN_PARAM];
    }
  }
}

/**
 * JSON pages: a token header continues with the token; otherwise the body's
 * `next_page` names the next ordinal page, and a falsy value ends the listing.
 */
async function* paginateJson(
  fetchPage: StreamPageFetcher,
  initialParams: QueryParams
): AsyncGenerator<RawRecord, void, undefined> {
  const params: QueryParams = { ...initialParams };

  for (;;) {
    const response = await fetchPage({ ...params });
    const data = ResponseHandler.parseJson(response.body, 'stream page');
    const token = headerValue(response.headers, NEXT_PAGE_TOKEN_HEADER);

    yield data;

    if (token !== undefined) {
      params[PAGE_TOKEN_PARAM] = token;
      delete params['page'];
      continue;
    }

    const nextPage = data['next_page'];
    if (typeof nextPage !== 'number' || !nextPage) {
      return;
    }
    params['page'] = nextPage;
    delete params[PAGE_TOKEN_PARAM];
  }
}
