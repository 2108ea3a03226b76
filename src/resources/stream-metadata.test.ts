/**
 * Unit tests for the stream metadata resource functions
 */

import {
  STREAM_ID_BATCH_SIZE,
  denormalizeDeviceId,
  getAllStreamTypes,
  getPatientStreamMetadata,
  getStreamMetadata,
  normalizeDeviceId,
  streamAttributes,
} from './stream-metadata';
import {
  GET_PATIENT_WITH_DEVICES,
  GET_STREAM_LIST,
  GET_STREAM_TYPES,
  GET_STREAMS_BY_IDS,
} from '../graph/queries';
import { NotFoundError, UsageError } from '../errors';
import { Dimension, StreamMetadata, StreamMetadataCollection } from '../models/stream-metadata';
import { RawRecord } from '../types';
import { FakeMetadataTransport, connection } from '../test/test-utils';

const STREAM_TYPE = {
  id: 'st1',
  name: 'Tremor probability',
  shape: {
    dimensions: [
      { identifier: 'time', dataType: 'timestamp', quantityName: 'Time', unitName: 's' },
      { identifier: 'p', dataType: 'float', quantityName: 'Probability', unitName: '' },
    ],
  },
};

function apiStream(id: string, labels: Record<string, string> = {}): RawRecord {
  return {
    id,
    patientId: 'a',
    deviceId: 'patient-a,device-d1',
    algorithm: 'tremor.0',
    minTime: 100,
    maxTime: 200,
    streamType: STREAM_TYPE,
    parameters: Object.entries(labels).map(([key, value]) => ({ key, value })),
  };
}

function streamsById(variables: Record<string, unknown>): RawRecord {
  const ids = variables['streamIds'];
  const streams = Array.isArray(ids)
    ? ids.filter((id: unknown) => id !== 'missing').map((id: unknown) => apiStream(String(id)))
    : [];
  return { streamListByIds: { streams } };
}

describe('device id forms', () => {
  it('should normalize and denormalize device ids', () => {
    expect(normalizeDeviceId('patient-a,device-d1')).toBe('d1');
    expect(normalizeDeviceId('device-d1')).toBe('d1');
    expect(normalizeDeviceId('d1')).toBe('d1');
    expect(denormalizeDeviceId('a', 'd1')).toBe('patient-a,device-d1');
    expect(denormalizeDeviceId('patient-a', 'device-d1')).toBe('patient-a,device-d1');
  });
});

describe('streamAttributes', () => {
  it('should flatten parameters, the device id and the stream type', () => {
    const attributes = streamAttributes(
      apiStream('s1', { category: 'neural', measurement: 'lfp' })
    );

    expect(attributes).toEqual({
      id: 's1',
      patientId: 'a',
      deviceId: 'd1',
      algorithm: 'tremor.0',
      minTime: 100,
      maxTime: 200,
      category: 'neural',
      measurement: 'lfp',
      streamType: {
        id: 'st1',
        name: 'Tremor probability',
        dimensions: [
          { id: 'time', dataType: 'timestamp', quantityName: 'Time', unitName: 's' },
          { id: 'p', dataType: 'float', quantityName: 'Probability', unitName: '' },
        ],
      },
      parameters: { category: 'neural', measurement: 'lfp' },
    });
  });
});

describe('getStreamMetadata', () => {
  it('should return a single stream for a single id', async () => {
    const backend = new FakeMetadataTransport().route(GET_STREAMS_BY_IDS, streamsById);

    const stream = await getStreamMetadata('s1', backend);

    expect(stream).toBeInstanceOf(StreamMetadata);
    expect(stream.streamType?.dimensions[0]).toBeInstanceOf(Dimension);
    expect(stream.streamType?.dimensions.map(dimension => dimension.id)).toEqual(['time', 'p']);
    expect(backend.calls[0]?.variables).toEqual({ streamIds: ['s1'] });
  });

  it('should look ids up in batches', async () => {
    const backend = new FakeMetadataTransport().route(GET_STREAMS_BY_IDS, streamsById);
    const ids = Array.from({ length: STREAM_ID_BATCH_SIZE + 50 }, (_, index) => `s${index}`);

    const streams = await getStreamMetadata(ids, backend);

    expect(streams).toBeInstanceOf(StreamMetadataCollection);
    expect(streams instanceof StreamMetadataCollection ? streams.size : 0).toBe(150);
    expect(
      backend.calls.map(call => {
        const batch = call.variables['streamIds'];
        return Array.isArray(batch) ? batch.length : 0;
      })
    ).toEqual([100, 50]);
  });

  it('should name the ids the API did not return', async () => {
    const backend = new FakeMetadataTransport().route(GET_STREAMS_BY_IDS, streamsById);

    const lookup = getStreamMetadata(['s1', 'missing'], backend);

    await expect(lookup).rejects.toThrow(NotFoundError);
    await expect(lookup).rejects.toThrow('1+ stream ID(s) not found: missing');
  });
});

describe('getAllStreamTypes', () => {
  it('should list every stream type with its dimensions', async () => {
    const backend = new FakeMetadataTransport().route(GET_STREAM_TYPES, () => ({
      streamTypeList: { streamTypes: [STREAM_TYPE] },
    }));

    const streamTypes = await getAllStreamTypes(backend);

    expect(streamTypes.complete).toBe(true);
    expect(streamTypes.get('st1').name).toBe('Tremor probability');
    expect(streamTypes.get('st1').dimensions).toHaveLength(2);
  });
});

describe('getPatientStreamMetadata', () => {
  function createBackend(): FakeMetadataTransport {
    return new FakeMetadataTransport()
      .route(GET_PATIENT_WITH_DEVICES, () => ({
        patient: { id: 'patient-a,patient', deviceList: connection('devices', []) },
      }))
      .route(GET_STREAM_LIST, variables =>
        variables['cursor'] === null
          ? { streamList: connection('streams', [apiStream('s1', { category: 'neural' })], 'c1') }
          : { streamList: connection('streams', [apiStream('s2', { category: 'vitals' })]) }
      );
  }

  it('should require a patient id', async () => {
    await expect(getPatientStreamMetadata('', {}, new FakeMetadataTransport())).rejects.toThrow(
      UsageError
    );
  });

  it('should check the patient and send the filters', async () => {
    const backend = createBackend();

    const streams = await getPatientStreamMetadata(
      'patient-a',
      { deviceId: 'd1', category: 'neural', parameters: { frequency: '250' } },
      backend
    );

    expect(streams.complete).toBe(true);
    expect([...streams.ids()]).toEqual(['s1', 's2']);
    expect(backend.calls[0]?.statement).toBe(GET_PATIENT_WITH_DEVICES);
    expect(backend.callsTo(GET_STREAM_LIST)[0]?.variables).toEqual({
      filters: {
        patientId: 'a',
        deviceId: 'patient-a,device-d1',
        streamTypeId: undefined,
        algorithm: undefined,
        parameters: [
          { key: 'frequency', value: '250' },
          { key: 'category', value: 'neural' },
        ],
      },
      cursor: null,
    });
  });

  it('should filter a fetched collection locally', async () => {
    const streams = await getPatientStreamMetadata('a', {}, createBackend());

    const neural = streams.filter({ category: 'neural', patientId: 'a' });

    expect([...neural.ids()]).toEqual(['s1']);
    expect([...streams.filter({ filterFunction: stream => stream.id === 's2' }).ids()]).toEqual([
      's2',
    ]);
    expect(streams.filter({ algorithm: 'other' }).size).toBe(0);
  });
});
