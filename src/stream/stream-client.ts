/**
 * Client for the streaming data API
 */

import { Logger, QueryParams, RawRecord, StreamPage, StreamTransport } from '../types';
import { UsageError } from '../errors';
import { HttpClient } from '../http/http-client';
import { Config } from '../config/config';
import { AuthManager } from '../auth/auth-manager';
import { RetryManager } from '../utils/retry-manager';
import { defaultLogger } from '../utils/logger';
import { ResponseHandler } from '../utils/response-handler';
import {
  StreamPaginationOptions,
  paginateStream,
} from '../core/paginator';
import { ClientOptions } from '../graph/graph-client';

const ALLOWED_PREFIX = '/v2/';

/**
 * Drop unset parameters so they are not sent as empty strings.
 */
function compactParams(params: QueryParams): QueryParams {
  const compacted: QueryParams = {};
  for (const [name, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      compacted[name] = value;
    }
  }
  return compacted;
}

/**
 * Repeat array values (`stream_id=a&stream_id=b`), as the batch endpoints
 * expect.
 */
function serializeParams(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        search.append(name, String(item));
      }
    } else {
      search.append(name, String(value));
    }
  }
  return search.toString();
}

export class StreamClient implements StreamTransport {
  readonly config: Config;
  private httpClient: HttpClient;
  private logger: Logger;

  constructor(config: Config, options: ClientOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? defaultLogger;
    this.httpClient = new HttpClient({
      baseURL: config.streamUrl,
      timeout: config.timeout,
      headers: {
        'User-Agent': config.userAgent,
        ...config.headers,
      },
      auth: new AuthManager(config.auth),
      retry: new RetryManager(
        { maxAttempts: config.retryAttempts, baseDelay: config.retryDelay },
        this.logger
      ),
      logger: this.logger,
      adapter: options.adapter,
    });
  }

  private checkPath(path: string): void {
    if (!path.startsWith(ALLOWED_PREFIX)) {
      throw new UsageError(`stream API paths must start with ${ALLOWED_PREFIX}: ${path}`);
    }
  }

  /**
   * Fetch one page; the body is returned as text.
   */
  async fetchPage(path: string, params: QueryParams): Promise<StreamPage> {
    this.checkPath(path);
    const query = serializeParams(compactParams(params));
    const response = await this.httpClient.request<unknown>({
      method: 'GET',
      url: query ? `${path}?${query}` : path,
      responseType: 'text',
    });

    return {
      body: typeof response.data === 'string' ? response.data : '',
      headers: response.headers,
      status: response.status,
    };
  }

  /**
   * Iterate over every page of a paginated endpoint.
   */
  getData(
    path: string,
    params: QueryParams,
    options: StreamPaginationOptions & { format: 'json' }
  ): AsyncGenerator<RawRecord, void, undefined>;
  getData(
    path: string,
    params: QueryParams,
    options?: StreamPaginationOptions & { format?: 'csv' }
  ): AsyncGenerator<string, void, undefined>;
  getData(
    path: string,
    params: QueryParams,
    options?: StreamPaginationOptions
  ): AsyncGenerator<string | RawRecord, void, undefined>;
  getData(
    path: string,
    params: QueryParams,
    options: StreamPaginationOptions = {}
  ): AsyncGenerator<string | RawRecord, void, undefined> {
    this.checkPath(path);
    return paginateStream(
      pageParams => this.fetchPage(path, pageParams),
      params,
      options
    );
  }

  /**
   * Single, unpaginated JSON request.
   */
  async getJson(path: string, params: QueryParams): Promise<RawRecord> {
    const page = await this.fetchPage(path, params);
    return ResponseHandler.parseJson(page.body, path);
  }
}
