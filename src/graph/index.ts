/**
 * Metadata API exports
 */

export { GraphClient, mapGraphErrors } from './graph-client';
export type { ClientOptions } from './graph-client';
export { MetadataApi } from './metadata-api';
export type { MetadataApiOptions, WhoamiResult } from './metadata-api';
