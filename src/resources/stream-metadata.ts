/**
 * Stream metadata: stream types, and the streams of each patient.
 */

import { MetadataTransport, RawRecord } from '../types';
import { EntityCollection } from '../core/collection';
import { collectCursor } from '../core/paginator';
import { NotFoundError, UsageError } from '../errors';
import { globalGraphClient } from '../client/registry';
import { GET_STREAM_LIST, GET_STREAM_TYPES, GET_STREAMS_BY_IDS } from '../graph/queries';
import {
  StreamMetadata,
  StreamMetadataCollection,
  StreamType,
  streamTypeAttributes,
} from '../models/stream-metadata';
import { ResponseHandler } from '../utils/response-handler';
import { getPatient } from './patients';

/**
 * The metadata API takes at most this many ids per lookup.
 */
export const STREAM_ID_BATCH_SIZE = 100;

function stripPrefix(id: string, prefix: string): string {
  return id.startsWith(prefix) ? id.slice(prefix.length) : id;
}

/**
 * Bare device id from any of its forms (`patient-a,device-b`, `device-b`).
 */
export function normalizeDeviceId(deviceId: string): string {
  return stripPrefix(deviceId.split(',').pop() ?? deviceId, 'device-');
}

/**
 * Absolute device key as the metadata API expects it.
 */
export function denormalizeDeviceId(patientId: string, deviceId: string): string {
  return `patient-${stripPrefix(patientId, 'patient-')},device-${normalizeDeviceId(deviceId)}`;
}

/**
 * Shape a stream record for the model: the stream type is flattened, the
 * device id is made bare, and each `{ key, value }` parameter is copied onto
 * the record and into a `parameters` map.
 */
export function streamAttributes(record: RawRecord): RawRecord {
  const { streamType, parameters, ...attributes } = record;
  const labels: Record<string, unknown> = {};
  for (const parameter of ResponseHandler.records(parameters)) {
    const key = parameter['key'];
    if (typeof key === 'string') {
      attributes[key] = parameter['value'];
      labels[key] = parameter['value'];
    }
  }

  const deviceId = attributes['deviceId'];
  if (typeof deviceId === 'string') {
    attributes['deviceId'] = normalizeDeviceId(deviceId);
  }
  attributes['streamType'] = streamTypeAttributes(ResponseHandler.record(streamType));
  attributes['parameters'] = labels;
  return attributes;
}

export async function getAllStreamTypes(
  client: MetadataTransport = globalGraphClient()
): Promise<EntityCollection<StreamType>> {
  const data = await client.execute(GET_STREAM_TYPES);
  const records = ResponseHandler.records(
    ResponseHandler.path(data, 'streamTypeList')['streamTypes']
  );
  const streamTypes = new EntityCollection(
    StreamType,
    records.map(record => new StreamType(streamTypeAttributes(record)))
  );
  streamTypes.markComplete();
  return streamTypes;
}

/**
 * Metadata for one stream, or for several as a collection.
 *
 * @throws NotFoundError listing the ids the API did not return
 */
export async function getStreamMetadata(
  streamIds: string,
  client?: MetadataTransport
): Promise<StreamMetadata>;
export async function getStreamMetadata(
  streamIds: readonly string[],
  client?: MetadataTransport
): Promise<StreamMetadata | StreamMetadataCollection>;
export async function getStreamMetadata(
  streamIds: string | readonly string[],
  client: MetadataTransport = globalGraphClient()
): Promise<StreamMetadata | StreamMetadataCollection> {
  const ids = typeof streamIds === 'string' ? [streamIds] : [...streamIds];
  const streams = new StreamMetadataCollection();

  for (let start = 0; start < ids.length; start += STREAM_ID_BATCH_SIZE) {
    const data = await client.execute(GET_STREAMS_BY_IDS, {
      streamIds: ids.slice(start, start + STREAM_ID_BATCH_SIZE),
    });
    const records = ResponseHandler.records(
      ResponseHandler.path(data, 'streamListByIds')['streams']
    );
    for (const record of records) {
      streams.add(new StreamMetadata(streamAttributes(record)));
    }
  }

  const missing = [...new Set(ids)].filter(id => !streams.has(id));
  if (missing.length > 0) {
    throw new NotFoundError(`1+ stream ID(s) not found: ${missing.join(',')}`);
  }

  const [only] = streams.toArray();
  if (streams.size === 1 && only !== undefined) {
    return only;
  }
  return streams;
}

export interface PatientStreamFilters {
  deviceId?: string;
  streamTypeId?: string;
  algorithm?: string;
  category?: string;
  measurement?: string;
  /**
   * Further key/value labels the streams must carry.
   */
  parameters?: Record<string, string>;
}

/**
 * A patient's streams matching every given filter.
 *
 * @throws UsageError when no patient id is given
 * @throws NotFoundError when the patient is not accessible
 */
export async function getPatientStreamMetadata(
  patientId: string,
  filters: PatientStreamFilters = {},
  client: MetadataTransport = globalGraphClient()
): Promise<StreamMetadataCollection> {
  if (!patientId) {
    throw new UsageError('must provide a patient id');
  }
  await getPatient(patientId, client);

  const labels: Record<string, string> = { ...filters.parameters };
  if (filters.category) {
    labels['category'] = filters.category;
  }
  if (filters.measurement) {
    labels['measurement'] = filters.measurement;
  }

  const bareId = stripPrefix(patientId, 'patient-');
  const queryFilters = {
    patientId: bareId,
    deviceId: filters.deviceId ? denormalizeDeviceId(bareId, filters.deviceId) : undefined,
    streamTypeId: filters.streamTypeId,
    algorithm: filters.algorithm,
    parameters: Object.entries(labels).map(([key, value]) => ({ key, value })),
  };

  const records = await collectCursor(async cursor => {
    const data = await client.execute(GET_STREAM_LIST, { filters: queryFilters, cursor });
    const connection = ResponseHandler.path(data, 'streamList');
    return {
      items: ResponseHandler.records(connection['streams']),
      endCursor: ResponseHandler.endCursor(connection),
    };
  });

  const streams = new StreamMetadataCollection(
    records.map(record => new StreamMetadata(streamAttributes(record)))
  );
  streams.markComplete();
  return streams;
}
