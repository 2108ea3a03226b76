/**
 * runeq - Main entry point
 *
 * Client library for the Rune Labs platform: patient, device and stream
 * metadata from the GraphQL API, and timeseries from the streaming API.
 */

export * from './types';
export * from './errors';
export * from './auth';
export * from './http';
export * from './utils';
export * from './core';
export * from './graph';
export * from './stream';
export * from './models';
export * from './client';
export * from './resources';

export { Config } from './config/config';
export {
  DEFAULT_CONFIG_PATH,
  DEFAULT_GRAPH_URL,
  DEFAULT_STREAM_URL,
} from './config/config';

// Version information
export const VERSION = '1.0.0';
