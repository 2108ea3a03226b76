/**
 * HTTP module exports
 */

export { HttpClient } from './http-client';
export type { HttpClientConfig } from './http-client';
