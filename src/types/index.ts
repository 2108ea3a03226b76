/**
 * Type definitions for the Rune query client
 *
 * Configuration, transport contracts and the raw record shapes that flow
 * between the transports and the entity model.
 */

// Raw data

/**
 * One record as the API returned it, keyed in the API's own casing.
 */
export type RawRecord = Record<string, unknown>;

export type TimeInput = number | Date;

export type QueryParamValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | ReadonlyArray<string | number>;

export type QueryParams = Record<string, QueryParamValue>;

// Logging

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

// Validation

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  field: string;
  message: string;
  code: string;
}

// Authentication

export type AuthMethod = 'client_keys' | 'access_token' | 'jwt';

export const AUTH_METHOD_CLIENT_KEYS: AuthMethod = 'client_keys';
export const AUTH_METHOD_ACCESS_TOKEN: AuthMethod = 'access_token';
export const AUTH_METHOD_JWT: AuthMethod = 'jwt';

export interface ClientKeyAuthConfig {
  type: 'client_keys';
  clientKeyId: string;
  clientAccessKey: string;
}

export interface AccessTokenAuthConfig {
  type: 'access_token';
  accessTokenId: string;
  accessTokenSecret: string;
}

export interface JWTAuthConfig {
  type: 'jwt';
  token: string;
  /**
   * Supplies a fresh token when the current one is rejected or expired.
   * Resolving to undefined means no new token is available.
   */
  refresh?: () => Promise<string | undefined>;
}

export type AuthConfig =
  | ClientKeyAuthConfig
  | AccessTokenAuthConfig
  | JWTAuthConfig;

// Configuration

export interface ConfigOptions {
  authMethod?: AuthMethod;
  clientKeyId?: string;
  clientAccessKey?: string;
  accessTokenId?: string;
  accessTokenSecret?: string;
  jwt?: string;
  refreshJwt?: () => Promise<string | undefined>;
  graphUrl?: string;
  streamUrl?: string;
  timeout?: number;
  retryAttempts?: number;
  retryDelay?: number;
  userAgent?: string;
  headers?: Record<string, string>;
}

// HTTP

export interface RequestConfig {
  method: 'GET' | 'POST';
  url: string;
  headers?: Record<string, string>;
  params?: QueryParams;
  data?: unknown;
  timeout?: number;
  responseType?: 'json' | 'text';
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  statusText: string;
  headers: Record<string, string>;
}

// Transports

/**
 * Executes one GraphQL statement against the metadata API.
 */
export interface MetadataTransport {
  execute(
    statement: string,
    variables?: Record<string, unknown>
  ): Promise<RawRecord>;
}

/**
 * One page of the streaming data API, body left as text.
 */
export interface StreamPage {
  body: string;
  headers: Record<string, string>;
  status: number;
}

export interface StreamTransport {
  fetchPage(path: string, params: QueryParams): Promise<StreamPage>;
}

export type StreamFormat = 'csv' | 'json';

export interface CursorPage<T> {
  items: T[];
  endCursor?: string | null;
}
