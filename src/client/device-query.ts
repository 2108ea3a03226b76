/**
 * Device queries, for one patient or across every accessible patient.
 */

import { RawRecord } from '../types';
import { Query } from '../core/query';
import { ResourceId } from '../core/resource-id';
import { KeyNotFoundError, UsageError } from '../errors';
import { Device, DeviceCollection } from '../models/device';
import { Patient } from '../models/patient';
import { Session } from './session';

export class DeviceQuery extends Query<Device, DeviceCollection> {
  constructor(
    private readonly session: Session,
    private readonly patient?: Patient
  ) {
    super(session);
  }

  private requirePatient(operation: string): Patient {
    if (!this.patient) {
      throw new UsageError(`${operation} requires a device query scoped to a patient`);
    }
    return this.patient;
  }

  private patientId(patient: Patient): ResourceId {
    if (!patient.resourceId) {
      throw new UsageError('patient has no id to query devices for');
    }
    return patient.resourceId;
  }

  /**
   * Unscoped, iteration walks the patients query and each patient's own
   * device query, so both caches apply.
   */
  override async *[Symbol.asyncIterator](): AsyncGenerator<Device, void, undefined> {
    if (this.patient) {
      yield* super[Symbol.asyncIterator]();
      return;
    }
    for await (const patient of this.session.patients) {
      yield* patient.devices;
    }
  }

  async *rawQuery(): AsyncGenerator<RawRecord, void, undefined> {
    if (this.patient) {
      yield* this.session.graph.listPatientDevices(this.patientId(this.patient));
      return;
    }
    for await (const patient of this.session.patients) {
      yield* this.session.graph.listPatientDevices(this.patientId(patient));
    }
  }

  /**
   * Find one of the patient's devices by scanning its device list. Accepts a
   * bare id, a `device-` prefixed id or an absolute key under the patient.
   *
   * @throws UsageError for an unscoped query, or an absolute key that belongs
   *   to another patient
   * @throws KeyNotFoundError when the patient has no such device
   */
  async get(id: string): Promise<Device> {
    const patient = this.requirePatient('device lookup');

    let wanted = id;
    if (id.includes(',')) {
      const deviceId = ResourceId.parse(id);
      if (deviceId.principal !== this.patientId(patient).principal) {
        throw new UsageError('device does not belong to the specified patient');
      }
      wanted = deviceId.unqualified;
    } else if (id.includes('-')) {
      wanted = id.slice(id.indexOf('-') + 1);
    }

    for await (const device of this) {
      if (device.id === wanted) {
        return device;
      }
    }
    throw new KeyNotFoundError(wanted);
  }

  protected wrap(record: RawRecord): Device {
    return new Device(record);
  }

  protected createCollection(): DeviceCollection {
    return new DeviceCollection([], this.patient?.resourceId);
  }

  protected readCache(): DeviceCollection {
    return this.requirePatient('device caching').deviceSet;
  }

  protected writeCache(collection: DeviceCollection): void {
    this.requirePatient('device caching').deviceSet = collection;
  }
}
