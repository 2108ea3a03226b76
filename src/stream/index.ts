/**
 * Streaming API exports
 */

export { StreamClient } from './stream-client';
export { parseCsvPage, parseCsvPages } from './csv';
export type { CsvRow } from './csv';
