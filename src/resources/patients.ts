/**
 * Patients and their devices, fetched in full on every call.
 */

import { MetadataTransport, RawRecord } from '../types';
import { collectCursor, paginateCursor } from '../core/paginator';
import { NotFoundError } from '../errors';
import { globalGraphClient } from '../client/registry';
import { GET_ALL_PATIENTS_WITH_DEVICES, GET_PATIENT_WITH_DEVICES } from '../graph/queries';
import { Device, DeviceCollection } from '../models/device';
import { Patient, PatientCollection } from '../models/patient';
import { ResponseHandler } from '../utils/response-handler';

/**
 * Build a patient from its record and an already complete device list.
 */
function buildPatient(record: RawRecord, devices: RawRecord[]): Patient {
  const attributes = { ...record };
  delete attributes['deviceList'];
  const patient = new Patient(attributes);
  const owner = patient.id;
  const deviceSet = new DeviceCollection([], patient.resourceId);
  for (const device of devices) {
    deviceSet.add(new Device({ ...device, patientId: owner }));
  }
  deviceSet.markComplete();
  patient.deviceSet = deviceSet;
  return patient;
}

/**
 * Fetch a patient and every page of its devices.
 *
 * @throws NotFoundError when the API has no such patient
 */
export async function getPatient(
  patientId: string,
  client: MetadataTransport = globalGraphClient()
): Promise<Patient> {
  const qualified = Patient.qualify(patientId);
  // the patient fields, as of the last device page
  const latest: { record?: RawRecord } = {};

  const devices = await collectCursor(async cursor => {
    const data = await client.execute(GET_PATIENT_WITH_DEVICES, {
      patientId: qualified,
      cursor,
    });
    const [patient] = ResponseHandler.records([data['patient']]);
    if (patient === undefined) {
      throw new NotFoundError(`patient not found: ${patientId}`);
    }
    latest.record = patient;
    const deviceList = ResponseHandler.record(patient['deviceList']);
    return {
      items: ResponseHandler.records(deviceList['devices']),
      endCursor: ResponseHandler.endCursor(deviceList),
    };
  });

  if (latest.record === undefined) {
    throw new NotFoundError(`patient not found: ${patientId}`);
  }
  return buildPatient(latest.record, devices);
}

/**
 * Every patient the caller can access, each with all of its devices. A
 * patient whose embedded device list has more pages is fetched again on its
 * own.
 */
export async function getAllPatients(
  client: MetadataTransport = globalGraphClient()
): Promise<PatientCollection> {
  const patients = new PatientCollection();

  const pages = paginateCursor(async cursor => {
    const data = await client.execute(GET_ALL_PATIENTS_WITH_DEVICES, {
      patientCursor: cursor,
      deviceCursor: null,
    });
    const connection = ResponseHandler.path(data, 'org', 'patientAccessList');
    return {
      items: ResponseHandler.records(connection['patientAccess']).map(access =>
        ResponseHandler.record(access['patient'])
      ),
      endCursor: ResponseHandler.endCursor(connection),
    };
  });

  for await (const page of pages) {
    for (const record of page) {
      const deviceList = ResponseHandler.record(record['deviceList']);
      if (ResponseHandler.endCursor(deviceList) === null) {
        patients.add(buildPatient(record, ResponseHandler.records(deviceList['devices'])));
      } else {
        const id = ResponseHandler.optionalString(record['id']) ?? '';
        patients.add(await getPatient(id, client));
      }
    }
  }

  patients.markComplete();
  return patients;
}

/**
 * One device of a patient. With a Patient in hand, no request is made.
 *
 * @throws KeyNotFoundError when the patient has no such device
 */
export async function getDevice(
  patient: Patient | string,
  deviceId: string,
  client?: MetadataTransport
): Promise<Device> {
  const owner =
    typeof patient === 'string' ? await getPatient(patient, client) : patient;
  return owner.device(deviceId);
}

export async function getPatientDevices(
  patient: Patient | string,
  client?: MetadataTransport
): Promise<DeviceCollection> {
  const owner =
    typeof patient === 'string' ? await getPatient(patient, client) : patient;
  return owner.deviceSet;
}

/**
 * Devices of a set of patients, given as a collection or as ids; every
 * accessible patient when omitted or empty. Devices are keyed by absolute id, so the
 * union never holds duplicates.
 */
export async function getAllDevices(
  patients?: PatientCollection | readonly string[],
  client?: MetadataTransport
): Promise<DeviceCollection> {
  const noneGiven =
    patients === undefined ||
    (patients instanceof PatientCollection ? patients.size === 0 : patients.length === 0);
  if (noneGiven) {
    const all = await getAllPatients(client);
    return all.devices();
  }
  if (patients instanceof PatientCollection) {
    return patients.devices();
  }

  const devices = new DeviceCollection();
  for (const patientId of patients) {
    const patient = await getPatient(patientId, client);
    devices.update(patient.deviceSet);
  }
  return devices;
}
