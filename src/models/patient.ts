/**
 * Patients: the people whose data is measured. Each patient owns zero or
 * more devices.
 */

import { RawRecord } from '../types';
import { Entity } from '../core/entity';
import { EntityCollection } from '../core/collection';
import { ResourceId } from '../core/resource-id';
import { KeyNotFoundError, UsageError } from '../errors';
import { DeviceQuery } from '../client/device-query';
import { Session } from '../client/session';
import { Device, DeviceCollection } from './device';

export class Patient extends Entity {
  static readonly resource: string = 'patient';

  /**
   * Devices known for this patient. Filled by the patient's device query
   * when the session caches, or up front by the eager resource functions.
   */
  deviceSet: DeviceCollection;

  private session?: Session;

  constructor(attributes: RawRecord) {
    super(attributes);
    this.deviceSet = new DeviceCollection([], this.resourceId);
  }

  /**
   * Absolute patient key as the metadata API expects it
   * (`patient-<id>,patient`).
   */
  static qualify(id: string): string {
    const principal = id.includes('-') ? id : `patient-${id}`;
    return principal.includes(',') ? principal : `${principal},patient`;
  }

  static override identify(rawId: string): ResourceId {
    return ResourceId.parse(Patient.qualify(rawId));
  }

  /**
   * Bind the patient to a session so that `devices` can query through it.
   */
  attach(session: Session): this {
    this.session = session;
    return this;
  }

  get codeName(): string | undefined {
    return this.optionalString('codeName');
  }

  /**
   * Query over this patient's registered devices.
   *
   * @throws UsageError when the patient is not attached to a session
   */
  get devices(): DeviceQuery {
    if (!this.session) {
      throw new UsageError(
        'patient is not attached to a session; use deviceSet or device() instead'
      );
    }
    return new DeviceQuery(this.session, this);
  }

  /**
   * Look up one of the patient's known devices. Accepts a bare id, a
   * `device-` prefixed id or an absolute key.
   *
   * @throws KeyNotFoundError when the patient has no such device
   */
  device(deviceId: string): Device {
    const component = deviceId.split(',').pop() ?? deviceId;
    const wanted = component.startsWith('device-')
      ? component.slice('device-'.length)
      : component;

    for (const device of this.deviceSet) {
      if (device.id === wanted) {
        return device;
      }
    }
    throw new KeyNotFoundError(wanted, `device not found with id: ${wanted}`);
  }

  override toDict(): RawRecord {
    const result = super.toDict();
    if (this.deviceSet.complete) {
      result['devices'] = this.deviceSet.toList();
    }
    return result;
  }
}

export class PatientCollection extends EntityCollection<Patient> {
  constructor(patients: Iterable<Patient> = []) {
    super(Patient, patients);
  }

  protected override resolveKey(id: string | ResourceId): string | undefined {
    return id instanceof ResourceId ? id.toString() : Patient.qualify(id);
  }

  protected override spawn(): PatientCollection {
    return new PatientCollection();
  }

  /**
   * Every known device of every patient in the collection.
   */
  devices(): DeviceCollection {
    const devices = new DeviceCollection();
    for (const patient of this) {
      devices.update(patient.deviceSet);
    }
    return devices;
  }
}
