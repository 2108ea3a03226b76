/**
 * Patient events
 *
 * The API serves at most 90 days of events per query, so longer ranges are
 * fetched window by window, each window paginated to the end before the
 * next one starts.
 */

import { MetadataTransport, RawRecord, TimeInput } from '../types';
import { EntityCollection } from '../core/collection';
import { iterateCursor } from '../core/paginator';
import { globalGraphClient } from '../client/registry';
import { GET_EVENT_LIST } from '../graph/queries';
import { Event } from '../models/event';
import { ResponseHandler } from '../utils/response-handler';
import { toUnixSeconds } from '../utils/time';

export const MAX_QUERY_RANGE_SECS = 90 * 24 * 60 * 60;

export interface EventClassificationFilter {
  namespace: string;
  category: string;
  enum?: string;
}

export interface EventQueryOptions {
  /**
   * Classifications to include; all events when omitted.
   */
  includeFilters?: EventClassificationFilter[];
  client?: MetadataTransport;
}

/**
 * Reshape an API event for the Event model:
 * - `duration` becomes `startTime` and `endTime` (`endTimeMax` wins when set)
 * - a custom display name replaces the generic one
 * - the JSON `payload` string is parsed
 * - tags are reduced to their names
 */
export function reformatEvent(event: RawRecord, patientId: string): RawRecord {
  const { duration, customDetail, payload, tags, ...rest } = event;
  const span = ResponseHandler.record(duration);
  const endTimeMax = span['endTimeMax'];

  const attributes: RawRecord = {
    ...rest,
    patientId,
    startTime: span['startTime'],
    endTime: endTimeMax !== null && endTimeMax !== undefined ? endTimeMax : span['endTime'],
    payload: ResponseHandler.parseJson(
      typeof payload === 'string' && payload ? payload : '{}',
      'event payload'
    ),
    tags: ResponseHandler.records(tags)
      .map(tag => tag['name'])
      .filter((name): name is string => typeof name === 'string'),
  };

  const customName = ResponseHandler.record(customDetail)['displayName'];
  if (typeof customName === 'string' && customName) {
    attributes['displayName'] = customName;
  }
  return attributes;
}

async function* iterateEvents(
  patientId: string,
  startTime: number,
  endTime: number,
  includeFilters: EventClassificationFilter[] | undefined,
  client: MetadataTransport
): AsyncGenerator<Event, void, undefined> {
  for (
    let windowStart = startTime;
    windowStart < endTime;
    windowStart = Math.min(windowStart + MAX_QUERY_RANGE_SECS, endTime)
  ) {
    const windowEnd = Math.min(windowStart + MAX_QUERY_RANGE_SECS, endTime);

    const records = iterateCursor(async cursor => {
      const data = await client.execute(GET_EVENT_LIST, {
        patientId,
        cursor,
        startTime: windowStart,
        endTime: windowEnd,
        ...(includeFilters && includeFilters.length > 0 ? { includeFilters } : {}),
      });
      // a patient without events has a null event list
      const eventList = ResponseHandler.path(data, 'patient', 'eventList');
      return {
        items: ResponseHandler.records(eventList['events']),
        endCursor: ResponseHandler.endCursor(eventList),
      };
    });

    for await (const record of records) {
      yield new Event(reformatEvent(record, patientId));
    }
  }
}

/**
 * A patient's events in `[startTime, endTime)`, optionally restricted to
 * some classifications.
 */
export async function getPatientEvents(
  patientId: string,
  startTime: TimeInput,
  endTime: TimeInput,
  options: EventQueryOptions = {}
): Promise<EntityCollection<Event>> {
  const client = options.client ?? globalGraphClient();
  const events = new EntityCollection(Event);
  for await (const event of iterateEvents(
    patientId,
    toUnixSeconds(startTime),
    toUnixSeconds(endTime),
    options.includeFilters,
    client
  )) {
    events.add(event);
  }
  events.markComplete();
  return events;
}

function categoryEvents(category: string) {
  return (
    patientId: string,
    startTime: TimeInput,
    endTime: TimeInput,
    client?: MetadataTransport
  ): Promise<EntityCollection<Event>> =>
    getPatientEvents(patientId, startTime, endTime, {
      includeFilters: [{ namespace: 'patient', category, enum: '*' }],
      client,
    });
}

/**
 * Activities, logged by hand or ingested from HealthKit.
 */
export const getPatientActivityEvents = categoryEvents('activity');

/**
 * Medication logs. The `method` attribute tells manual logs from
 * scheduled autologs.
 */
export const getPatientMedicationEvents = categoryEvents('medication');

export const getPatientSymptomEvents = categoryEvents('symptom');

export const getPatientWellbeingEvents = categoryEvents('wellbeing');
