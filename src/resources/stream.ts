/**
 * Stream data, straight from the streaming API.
 */

import { QueryParams, RawRecord, StreamFormat, StreamTransport, TimeInput } from '../types';
import { UsageError } from '../errors';
import { paginateStream } from '../core/paginator';
import { globalStreamClient } from '../client/registry';
import { ResponseHandler } from '../utils/response-handler';
import { optionalUnixSeconds, toUnixSeconds } from '../utils/time';

export type TimestampFormat = 'unix' | 'unixns' | 'iso';

interface ResponseFormatOptions {
  /**
   * Maximum number of timestamps across all pages; 0 fetches everything.
   */
  limit?: number;
  pageToken?: string;
  timestamp?: TimestampFormat;
  /**
   * UTC offset in seconds for string timestamps, e.g. -28800 for PST.
   */
  timezone?: number;
  /**
   * IANA timezone name; accounts for daylight saving time.
   */
  timezoneName?: string;
}

export interface StreamDataOptions extends ResponseFormatOptions {
  startTime?: TimeInput;
  startTimeNs?: number;
  endTime?: TimeInput;
  endTimeNs?: number;
  format?: StreamFormat;
  translateEnums?: boolean;
}

export interface StreamAvailabilityOptions extends ResponseFormatOptions {
  startTime: TimeInput;
  endTime: TimeInput;
  /**
   * Interval between returned timestamps, in seconds.
   */
  resolution: number;
  /**
   * How availability combines over several streams; required for more than
   * one stream.
   */
  batchOperation?: 'any' | 'all';
  format?: StreamFormat;
}

function formatParams(options: ResponseFormatOptions): QueryParams {
  return {
    limit: options.limit,
    page_token: options.pageToken,
    timestamp: options.timestamp ?? 'iso',
    timezone: options.timezone,
    timezone_name: options.timezoneName,
  };
}

/**
 * Pages of a stream's data: CSV text, or parsed JSON bodies.
 *
 * @throws UsageError when a time bound is given both in seconds and in
 *   nanoseconds
 */
export function getStreamData(
  streamId: string,
  options: StreamDataOptions & { format: 'json' },
  client?: StreamTransport
): AsyncGenerator<RawRecord, void, undefined>;
export function getStreamData(
  streamId: string,
  options?: StreamDataOptions & { format?: 'csv' },
  client?: StreamTransport
): AsyncGenerator<string, void, undefined>;
export function getStreamData(
  streamId: string,
  options: StreamDataOptions = {},
  client: StreamTransport = globalStreamClient()
): AsyncGenerator<string | RawRecord, void, undefined> {
  if (options.startTime !== undefined && options.startTimeNs !== undefined) {
    throw new UsageError('only startTime or startTimeNs can be defined, not both');
  }
  if (options.endTime !== undefined && options.endTimeNs !== undefined) {
    throw new UsageError('only endTime or endTimeNs can be defined, not both');
  }

  const path = `/v2/streams/${streamId}`;
  const params: QueryParams = {
    start_time: optionalUnixSeconds(options.startTime),
    start_time_ns: options.startTimeNs,
    end_time: optionalUnixSeconds(options.endTime),
    end_time_ns: options.endTimeNs,
    format: options.format ?? 'csv',
    translate_enums: options.translateEnums ?? true,
    ...formatParams(options),
  };

  return paginateStream(
    pageParams => client.fetchPage(path, pageParams),
    params,
    { format: options.format ?? 'csv' }
  );
}

/**
 * Availability of one stream, or the combined availability of several.
 *
 * @throws UsageError when several streams are given without a batch operation
 */
export function getStreamAvailability(
  streamIds: string | readonly string[],
  options: StreamAvailabilityOptions & { format: 'json' },
  client?: StreamTransport
): AsyncGenerator<RawRecord, void, undefined>;
export function getStreamAvailability(
  streamIds: string | readonly string[],
  options: StreamAvailabilityOptions & { format?: 'csv' },
  client?: StreamTransport
): AsyncGenerator<string, void, undefined>;
export function getStreamAvailability(
  streamIds: string | readonly string[],
  options: StreamAvailabilityOptions,
  client: StreamTransport = globalStreamClient()
): AsyncGenerator<string | RawRecord, void, undefined> {
  const ids = typeof streamIds === 'string' ? [streamIds] : [...streamIds];
  const params: QueryParams = {
    start_time: toUnixSeconds(options.startTime),
    end_time: toUnixSeconds(options.endTime),
    resolution: options.resolution,
    batch_operation: options.batchOperation,
    format: options.format ?? 'csv',
    ...formatParams(options),
  };

  let path: string;
  if (ids.length === 1) {
    path = `/v2/streams/${ids[0]}/availability`;
  } else {
    if (!options.batchOperation) {
      throw new UsageError('batchOperation must be specified for multiple stream ids');
    }
    path = '/v2/batch/availability';
    params['stream_id'] = ids;
  }

  return paginateStream(
    pageParams => client.fetchPage(path, pageParams),
    params,
    { format: options.format ?? 'csv' }
  );
}

/**
 * A stream's average day, divided into intervals of `resolution` seconds,
 * over `nDays` days from `startTime`.
 */
export async function getStreamDailyAggregate(
  streamId: string,
  options: { startTime: TimeInput; resolution: number; nDays: number },
  client: StreamTransport = globalStreamClient()
): Promise<RawRecord> {
  const path = `/v2/streams/${streamId}/daily_aggregate`;
  const page = await client.fetchPage(path, {
    start_time: toUnixSeconds(options.startTime),
    resolution: options.resolution,
    n_days: options.nDays,
  });
  return ResponseHandler.parseJson(page.body, path);
}

/**
 * A stream downsampled into windows of `resolution` seconds, each reduced
 * with `aggregateFunction`.
 */
export async function getStreamAggregateWindow(
  streamId: string,
  options: {
    startTime: TimeInput;
    endTime: TimeInput;
    resolution: number;
    aggregateFunction: 'sum' | 'mean';
    timestamp?: TimestampFormat;
    timezone?: number;
    timezoneName?: string;
  },
  client: StreamTransport = globalStreamClient()
): Promise<RawRecord> {
  const path = `/v2/streams/${streamId}/aggregate_window`;
  const page = await client.fetchPage(path, {
    start_time: toUnixSeconds(options.startTime),
    end_time: toUnixSeconds(options.endTime),
    resolution: options.resolution,
    aggregate_function: options.aggregateFunction,
    timestamp: options.timestamp ?? 'iso',
    timezone: options.timezone,
    timezone_name: options.timezoneName,
  });
  return ResponseHandler.parseJson(page.body, path);
}
