/**
 * Utilities module exports
 */

export { ResponseHandler, isRecord } from './response-handler';
export { RetryManager } from './retry-manager';
export type { RetryConfig } from './retry-manager';
export { defaultLogger, silentLogger } from './logger';
export { toUnixSeconds, optionalUnixSeconds, nowInSeconds } from './time';
