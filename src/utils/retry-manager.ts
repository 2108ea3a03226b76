/**
 * Retry Manager with exponential backoff and jitter
 *
 * Retries connection-level failures of a single request. API errors are
 * answers from the server and are never retried here.
 */

import { RuneError, ErrorContext } from '../errors';
import { Logger } from '../types';
import { defaultLogger } from './logger';

export interface RetryConfig {
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  jitterType: 'none' | 'full' | 'equal';
}

export type RetryableFunction<T> = () => Promise<T>;

export class RetryManager {
  private config: RetryConfig;
  private logger: Logger;

  constructor(config: Partial<RetryConfig> = {}, logger: Logger = defaultLogger) {
    this.config = {
      maxAttempts: config.maxAttempts ?? 3,
      baseDelay: config.baseDelay ?? 1000,
      maxDelay: config.maxDelay ?? 30000,
      backoffMultiplier: config.backoffMultiplier ?? 2,
      jitterType: config.jitterType ?? 'full',
    };
    this.logger = logger;
  }

  /**
   * Execute a function with retry logic
   */
  async execute<T>(
    fn: RetryableFunction<T>,
    context?: Partial<ErrorContext>
  ): Promise<T> {
    let delay = this.config.baseDelay;

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.config.maxAttempts || !this.shouldRetry(error)) {
          throw error;
        }

        const actualDelay = this.calculateDelay(delay);
        this.logger.warn(
          `Retry attempt ${attempt}/${this.config.maxAttempts} after ${actualDelay}ms delay`,
          {
            url: context?.requestUrl,
            error: error instanceof Error ? error.message : String(error),
          }
        );

        await this.sleep(actualDelay);
        delay = Math.min(delay * this.config.backoffMultiplier, this.config.maxDelay);
      }
    }
  }

  /**
   * Only errors that declare themselves retryable are retried.
   */
  private shouldRetry(error: unknown): boolean {
    return error instanceof RuneError && error.isRetryable();
  }

  private calculateDelay(baseDelay: number): number {
    switch (this.config.jitterType) {
      case 'none':
        return baseDelay;
      case 'full':
        return Math.floor(Math.random() * baseDelay);
      case 'equal':
        return Math.floor(baseDelay / 2 + (Math.random() * baseDelay) / 2);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  getConfig(): RetryConfig {
    return { ...this.config };
  }
}
