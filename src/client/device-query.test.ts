/**
 * Unit tests for DeviceQuery
 */

import { Session } from './session';
import { LIST_PATIENT_DEVICES, LIST_PATIENTS } from '../graph/queries';
import { KeyNotFoundError, UsageError } from '../errors';
import { Device } from '../models/device';
import { Patient } from '../models/patient';
import { RawRecord } from '../types';
import { silentLogger } from '../utils/logger';
import { FakeMetadataTransport, connection } from '../test/test-utils';

const DEVICES: Record<string, RawRecord[]> = {
  'patient-a,patient': [
    { id: 'patient-a,device-d1', alias: 'Phone', deviceType: { id: 'phone' }, createdAt: 100 },
    { id: 'patient-a,device-d2', alias: 'Watch', deviceType: { id: 'watch' }, createdAt: 300 },
  ],
  'patient-b,patient': [
    { id: 'patient-b,device-d3', alias: 'Implant', deviceType: { id: 'implant' } },
  ],
};

function createBackend(): FakeMetadataTransport {
  return new FakeMetadataTransport()
    .route(LIST_PATIENTS, () => ({
      org: {
        patientAccessList: connection('patientAccess', [
          { patient: { id: 'patient-a,patient' } },
          { patient: { id: 'patient-b,patient' } },
        ]),
      },
    }))
    .route(LIST_PATIENT_DEVICES, variables => {
      const patientId = String(variables['patientId']);
      const devices = (DEVICES[patientId] ?? []).map(device => ({ ...device }));
      return { patient: { deviceList: connection('devices', devices) } };
    });
}

function aliases(devices: Device[]): Array<string | undefined> {
  return devices.map(device => device.alias);
}

describe('DeviceQuery', () => {
  let backend: FakeMetadataTransport;
  let session: Session;
  let patient: Patient;

  beforeEach(() => {
    backend = createBackend();
    session = new Session(backend, { logger: silentLogger });
    patient = new Patient({ id: 'patient-a,patient' }).attach(session);
  });

  describe('scoped to a patient', () => {
    it('should list the patient\'s enabled devices with their owner', async () => {
      const devices = await patient.devices.toArray();

      expect(aliases(devices)).toEqual(['Phone', 'Watch']);
      expect(devices[0]?.patientId).toBe('a');
      expect(devices[0]?.deviceType?.id).toBe('phone');
      expect(backend.callsTo(LIST_PATIENT_DEVICES)[0]?.variables).toEqual({
        patientId: 'patient-a,patient',
        withDisabled: false,
        cursor: null,
      });
    });

    it('should cache the devices on the patient', async () => {
      await patient.devices.toArray();
      await patient.devices.toArray();

      expect(backend.callsTo(LIST_PATIENT_DEVICES)).toHaveLength(1);
      expect(patient.deviceSet.complete).toBe(true);
      expect([...patient.deviceSet.ids()]).toEqual(['d1', 'd2']);
    });

    it('should apply the freeze point', async () => {
      session.freezeTime(200);

      expect(aliases(await patient.devices.toArray())).toEqual(['Phone']);
    });

    it('should look a device up by bare, prefixed or absolute id', async () => {
      expect((await patient.devices.get('d2')).alias).toBe('Watch');
      expect((await patient.devices.get('device-d2')).alias).toBe('Watch');
      expect((await patient.devices.get('patient-a,device-d1')).alias).toBe('Phone');
    });

    it('should refuse an absolute id of another patient', async () => {
      await expect(patient.devices.get('patient-b,device-d3')).rejects.toThrow(
        'device does not belong to the specified patient'
      );
    });

    it('should throw KeyNotFoundError for an unknown device', async () => {
      await expect(patient.devices.get('zz')).rejects.toThrow(KeyNotFoundError);
    });

    it('should match device types case-insensitively in findAllBy', async () => {
      const watches: Device[] = [];
      for await (const device of patient.devices.findAllBy({ deviceType: 'WATCH' })) {
        watches.push(device);
      }

      expect(aliases(watches)).toEqual(['Watch']);
    });
  });

  describe('across all patients', () => {
    it('should iterate every patient\'s devices', async () => {
      const devices = await session.devices.toArray();

      expect(aliases(devices)).toEqual(['Phone', 'Watch', 'Implant']);
      expect(backend.callsTo(LIST_PATIENTS)).toHaveLength(1);
      expect(backend.callsTo(LIST_PATIENT_DEVICES)).toHaveLength(2);
    });

    it('should reuse the per-patient caches', async () => {
      await session.devices.toArray();
      await session.devices.toArray();

      expect(backend.callsTo(LIST_PATIENTS)).toHaveLength(1);
      expect(backend.callsTo(LIST_PATIENT_DEVICES)).toHaveLength(2);
    });

    it('should stream raw records when caching is off', async () => {
      session.caching = false;

      const devices = await session.devices.toArray();
      const all = await session.devices.query();

      expect(devices).toHaveLength(3);
      expect([...all.ids()]).toEqual([
        'patient-a,device-d1',
        'patient-a,device-d2',
        'patient-b,device-d3',
      ]);
    });

    it('should not support point lookups', async () => {
      await expect(session.devices.get('d1')).rejects.toThrow(UsageError);
    });
  });

  it('should require a session to query devices', () => {
    expect(() => new Patient({ id: 'patient-a,patient' }).devices).toThrow(UsageError);
  });
});
