/**
 * CSV pages from the streaming API as records.
 *
 * Every page carries its own header row. Values stay strings; typing them
 * is left to the caller.
 */

import { Readable } from 'stream';
import csvParser from 'csv-parser';
import { isRecord } from '../utils/response-handler';

export type CsvRow = Record<string, string>;

function toRow(value: unknown): CsvRow {
  const row: CsvRow = {};
  if (isRecord(value)) {
    for (const [column, cell] of Object.entries(value)) {
      row[column] = typeof cell === 'string' ? cell : String(cell);
    }
  }
  return row;
}

export async function* parseCsvPage(page: string): AsyncGenerator<CsvRow, void, undefined> {
  const rows = Readable.from([page]).pipe(csvParser());
  for await (const row of rows) {
    yield toRow(row);
  }
}

export async function* parseCsvPages(
  pages: AsyncIterable<string>
): AsyncGenerator<CsvRow, void, undefined> {
  for await (const page of pages) {
    yield* parseCsvPage(page);
  }
}
