/**
 * Error handling classes
 *
 * Structured error types for the Rune query client. Every error raised by the
 * library derives from RuneError, so callers can catch the whole family or a
 * single kind.
 */

import { ValidationError as ValidationErrorType } from '../types';

export interface ErrorContext {
  timestamp: string;
  correlationId: string;
  requestUrl?: string;
  requestMethod?: string;
  responseHeaders?: Record<string, string>;
  retryAttempt?: number;
  totalRetries?: number;
  elapsedTime?: number;
  [key: string]: unknown;
}

export abstract class RuneError extends Error {
  abstract readonly code: string;
  public readonly timestamp: string;
  public readonly correlationId: string;

  constructor(
    message: string,
    public readonly context?: Partial<ErrorContext>,
    public readonly details?: string
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
    this.correlationId = context?.correlationId || this.generateCorrelationId();

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  private generateCorrelationId(): string {
    return `rune-${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
  }

  /**
   * Get error details for logging
   */
  getErrorDetails(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      correlationId: this.correlationId,
      context: this.context,
      details: this.details,
      stack: this.stack,
    };
  }

  /**
   * Get user-friendly error message
   */
  getUserMessage(): string {
    return this.message;
  }

  /**
   * Check if error is retryable
   */
  isRetryable(): boolean {
    return false;
  }
}

/**
 * Structured detail reported by the API: usually an object with a `type`
 * and a `message`, occasionally a bare string.
 */
export type APIErrorDetail = Record<string, unknown> | string;

function describeDetail(detail: APIErrorDetail): { type: string; text: string } {
  if (typeof detail === 'string') {
    return { type: 'Error', text: detail };
  }

  const type = typeof detail['type'] === 'string' ? detail['type'] : 'Error';
  const text =
    typeof detail['message'] === 'string'
      ? detail['message']
      : JSON.stringify(detail);

  return { type, text };
}

/**
 * Any non-success response from the metadata or streaming API.
 */
export class APIError extends RuneError {
  readonly code = 'API_ERROR';
  public readonly errorType: string;

  constructor(
    public readonly statusCode: number,
    public readonly detail: APIErrorDetail,
    context?: Partial<ErrorContext>
  ) {
    const { type, text } = describeDetail(detail);
    super(`${statusCode} ${type}: ${text}`, context, text);
    this.errorType = type;
  }

  isAuthFailure(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }
}

/**
 * The backend reported that the requested resource does not exist.
 */
export class NotFoundError extends RuneError {
  readonly code = 'NOT_FOUND';
  public readonly statusCode = 404;

  constructor(
    message = 'Resource not found',
    context?: Partial<ErrorContext>,
    details?: string
  ) {
    super(message, context, details);
  }
}

export class NetworkError extends RuneError {
  readonly code = 'NETWORK_ERROR';

  constructor(
    message: string,
    public readonly originalError: Error,
    context?: Partial<ErrorContext>,
    details?: string
  ) {
    super(message, context, details);
  }

  override isRetryable(): boolean {
    const message = this.originalError.message.toLowerCase();
    // DNS failures will not fix themselves between attempts
    return !message.includes('enotfound') && !message.includes('getaddrinfo');
  }

  override getUserMessage(): string {
    const message = this.originalError.message.toLowerCase();
    if (message.includes('timeout')) {
      return 'Request timed out. Please try again or check your network connection.';
    }
    if (message.includes('econnrefused')) {
      return 'Unable to connect to the Rune API. Please check the configured URL.';
    }
    return 'Network error occurred. Please check your connection and try again.';
  }
}

export class AuthenticationError extends RuneError {
  readonly code = 'AUTHENTICATION_ERROR';

  override getUserMessage(): string {
    return 'Authentication failed. Please check your credentials and try again.';
  }
}

export class ConfigurationError extends RuneError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(
    message: string,
    public readonly validationErrors?: ValidationErrorType[],
    context?: Partial<ErrorContext>
  ) {
    super(message, context);
  }

  override getUserMessage(): string {
    if (this.validationErrors?.length) {
      const errorMessages = this.validationErrors
        .map(e => e.message)
        .join(', ');
      return `Configuration error: ${errorMessages}`;
    }
    return this.message;
  }
}

/**
 * A bare identifier carried neither a `,` separator nor a resource hint.
 */
export class AmbiguousIdentifierError extends RuneError {
  readonly code = 'AMBIGUOUS_IDENTIFIER';

  constructor(public readonly identifier: string) {
    super(`ambiguous resource identifier: "${identifier}"`);
  }
}

/**
 * Programming error at the call site, e.g. a filter without conditions.
 */
export class UsageError extends RuneError {
  readonly code = 'USAGE_ERROR';
}

export class KeyNotFoundError extends RuneError {
  readonly code = 'KEY_NOT_FOUND';

  constructor(
    public readonly key: string,
    message = `no entry with id "${key}"`
  ) {
    super(message);
  }
}

export class AttributeNotFoundError extends RuneError {
  readonly code = 'ATTRIBUTE_NOT_FOUND';

  constructor(
    public readonly attribute: string,
    public readonly entityType: string
  ) {
    super(`${entityType} has no attribute "${attribute}"`);
  }
}

export class InitializationError extends RuneError {
  readonly code = 'INITIALIZATION_ERROR';

  constructor(
    message = 'runeq must be initialized by calling `initialize` before this function can be used'
  ) {
    super(message);
  }
}
