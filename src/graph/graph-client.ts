/**
 * GraphQL client for the metadata API
 */

import { AxiosAdapter } from 'axios';
import { Logger, MetadataTransport, RawRecord } from '../types';
import { APIError, NotFoundError } from '../errors';
import { HttpClient } from '../http/http-client';
import { Config } from '../config/config';
import { AuthManager } from '../auth/auth-manager';
import { RetryManager } from '../utils/retry-manager';
import { defaultLogger } from '../utils/logger';
import { ResponseHandler } from '../utils/response-handler';

export interface ClientOptions {
  logger?: Logger;
  adapter?: AxiosAdapter;
}

const NOT_FOUND_CODE = 'NotFoundError';

/**
 * Turn a GraphQL `errors` array into the matching error. Any error whose
 * `extensions.code` is NotFoundError makes the whole result a NotFoundError.
 */
export function mapGraphErrors(errors: unknown[], status = 200): Error {
  const records = ResponseHandler.records(errors);

  for (const error of records) {
    if (ResponseHandler.record(error['extensions'])['code'] === NOT_FOUND_CODE) {
      return new NotFoundError(
        ResponseHandler.optionalString(error['message']) ?? 'Resource not found'
      );
    }
  }

  const [first] = records;
  const code = first
    ? ResponseHandler.optionalString(ResponseHandler.record(first['extensions'])['code'])
    : undefined;
  const message = first ? ResponseHandler.optionalString(first['message']) : undefined;

  return new APIError(status, {
    type: code ?? 'GraphQLError',
    message: message ?? JSON.stringify(errors),
  });
}

export class GraphClient implements MetadataTransport {
  readonly config: Config;
  private httpClient: HttpClient;
  private logger: Logger;

  constructor(config: Config, options: ClientOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? defaultLogger;
    this.httpClient = new HttpClient({
      baseURL: config.graphUrl,
      timeout: config.timeout,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
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

  /**
   * Execute one GraphQL statement and return its `data`.
   *
   * @throws NotFoundError when the API reports a missing resource
   * @throws APIError for any other failure
   */
  async execute(
    statement: string,
    variables: Record<string, unknown> = {}
  ): Promise<RawRecord> {
    let body: RawRecord;
    try {
      const response = await this.httpClient.request<unknown>({
        method: 'POST',
        url: '/graphql',
        data: { query: statement, variables },
      });
      body = ResponseHandler.requireRecord(response.data, 'GraphQL response');
    } catch (error) {
      // GraphQL servers also report errors with a non-2xx status
      if (error instanceof APIError && typeof error.detail !== 'string') {
        const errors = error.detail['errors'];
        if (Array.isArray(errors)) {
          throw mapGraphErrors(errors, error.statusCode);
        }
      }
      throw error;
    }

    const errors = body['errors'];
    if (Array.isArray(errors) && errors.length > 0) {
      throw mapGraphErrors(errors);
    }
    return ResponseHandler.record(body['data']);
  }
}
