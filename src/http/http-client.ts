/**
 * HTTP Client implementation using axios
 *
 * Shared by the metadata and streaming transports: attaches auth headers,
 * maps failures onto the error hierarchy, retries connection failures and
 * re-sends once after a successful auth refresh.
 */

import axios, {
  AxiosAdapter,
  AxiosError,
  AxiosInstance,
  AxiosRequestConfig,
} from 'axios';
import { HttpResponse, Logger, RequestConfig } from '../types';
import { APIError, APIErrorDetail, ErrorContext, NetworkError } from '../errors';
import { AuthManager } from '../auth/auth-manager';
import { RetryManager } from '../utils/retry-manager';
import { defaultLogger } from '../utils/logger';
import { isRecord } from '../utils/response-handler';

export interface HttpClientConfig {
  baseURL: string;
  timeout?: number;
  headers?: Record<string, string>;
  auth?: AuthManager;
  retry?: RetryManager;
  logger?: Logger;
  /**
   * Replaces axios' network adapter, e.g. with an in-process fake.
   */
  adapter?: AxiosAdapter;
}

function normalizeHeaders(headers: unknown): Record<string, string> {
  const normalized: Record<string, string> = {};
  if (!isRecord(headers)) {
    return normalized;
  }
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      normalized[name] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      normalized[name] = String(value);
    } else if (Array.isArray(value)) {
      normalized[name] = value.join(', ');
    }
  }
  return normalized;
}

/**
 * The `error` detail of a JSON error body, whether axios parsed it or not.
 */
function errorDetailFromBody(body: unknown): APIErrorDetail | undefined {
  let data: unknown = body;
  if (typeof body === 'string') {
    try {
      data = JSON.parse(body);
    } catch {
      return undefined;
    }
  }
  if (!isRecord(data)) {
    return undefined;
  }
  const detail = data['error'];
  if (typeof detail === 'string' || isRecord(detail)) {
    return detail;
  }
  // GraphQL error bodies are passed whole
  if (Array.isArray(data['errors'])) {
    return data;
  }
  return undefined;
}

export class HttpClient {
  private axiosInstance: AxiosInstance;
  private retryManager: RetryManager;
  private auth?: AuthManager;
  private logger: Logger;

  constructor(config: HttpClientConfig) {
    this.axiosInstance = axios.create({
      baseURL: config.baseURL,
      timeout: config.timeout || 30000,
      headers: {
        ...config.headers,
      },
      ...(config.adapter && { adapter: config.adapter }),
    });

    this.logger = config.logger ?? defaultLogger;
    this.retryManager =
      config.retry ??
      new RetryManager(
        {
          maxAttempts: 3,
          baseDelay: 1000,
          maxDelay: 10000,
          jitterType: 'full',
        },
        this.logger
      );
    this.auth = config.auth;

    // Add response interceptor for error handling
    this.axiosInstance.interceptors.response.use(
      response => response,
      (error: unknown) => {
        throw this.mapAxiosError(error);
      }
    );
  }

  /**
   * Send a request. A 401/403 answer triggers one auth refresh; when the
   * refresh yields new credentials the request is sent exactly once more.
   */
  async request<T = unknown>(config: RequestConfig): Promise<HttpResponse<T>> {
    try {
      return await this.send<T>(config);
    } catch (error) {
      if (
        error instanceof APIError &&
        error.isAuthFailure() &&
        this.auth &&
        (await this.auth.refreshAuth())
      ) {
        this.logger.debug(`Credentials refreshed, retrying ${config.method} ${config.url}`);
        return this.send<T>(config);
      }
      throw error;
    }
  }

  private async send<T>(config: RequestConfig): Promise<HttpResponse<T>> {
    const context: Partial<ErrorContext> = {
      requestUrl: config.url,
      requestMethod: config.method,
      timestamp: new Date().toISOString(),
      correlationId: this.generateCorrelationId(),
    };
    const authHeaders = this.auth ? await this.auth.getAuthHeaders() : {};

    return this.retryManager.execute(async () => {
      const axiosConfig: AxiosRequestConfig = {
        method: config.method,
        url: config.url,
        headers: { ...authHeaders, ...config.headers },
      };

      if (config.params) {
        axiosConfig.params = config.params;
      }
      if (config.data !== undefined) {
        axiosConfig.data = config.data;
      }
      if (config.timeout) {
        axiosConfig.timeout = config.timeout;
      }
      if (config.responseType === 'text') {
        axiosConfig.responseType = 'text';
        // keep the body exactly as sent
        axiosConfig.transformResponse = [(data: unknown) => data];
      }

      this.logger.debug(`${config.method} ${config.url}`);
      const response = await this.axiosInstance.request<T>(axiosConfig);

      return {
        data: response.data,
        status: response.status,
        statusText: response.statusText,
        headers: normalizeHeaders(response.headers),
      };
    }, context);
  }

  /**
   * Generate correlation ID for request tracking
   */
  private generateCorrelationId(): string {
    return `http-${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
  }

  /**
   * Map axios errors onto APIError (an answer) or NetworkError (no answer)
   */
  private mapAxiosError(error: unknown): Error {
    const context: Partial<ErrorContext> = {
      timestamp: new Date().toISOString(),
      correlationId: this.generateCorrelationId(),
    };

    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const axiosError: AxiosError = error;
    context.requestUrl = axiosError.config?.url;
    context.requestMethod = axiosError.config?.method?.toUpperCase();

    if (axiosError.response) {
      const { status, statusText, data } = axiosError.response;
      context.responseHeaders = normalizeHeaders(axiosError.response.headers);

      const detail = errorDetailFromBody(data) ?? {
        type: 'HTTPError',
        message: statusText || `request failed with status ${status}`,
      };
      return new APIError(status, detail, context);
    }

    let message = 'Network error';
    let details = axiosError.message || 'An unknown network error occurred';

    if (axiosError.code === 'ECONNABORTED') {
      message = 'Request timeout';
      details = 'The request took too long to complete';
    } else if (axiosError.code === 'ECONNREFUSED') {
      message = 'Connection refused';
      details = 'Unable to connect to the server';
    } else if (axiosError.code === 'ENOTFOUND') {
      message = 'Host not found';
      details = 'The server hostname could not be resolved';
    } else if (axiosError.code === 'ECONNRESET') {
      message = 'Connection reset';
      details = 'The connection was reset by the server';
    }

    return new NetworkError(message, axiosError, context, details);
  }
}
