/**
 * Devices: the sensors (implants, phones, wearables) that produce a
 * patient's data.
 */

import { RawRecord } from '../types';
import { Entity, RelationMap } from '../core/entity';
import { EntityCollection } from '../core/collection';
import { ResourceId } from '../core/resource-id';

export class DeviceType extends Entity {
  static readonly resource: string = 'device_type';
  static readonly compoundIds: boolean = false;

  get displayName(): string | undefined {
    return this.optionalString('displayName');
  }

  /**
   * Device types also match a name string, case-insensitively, by id or by
   * display name.
   */
  override equals(other: unknown): boolean {
    if (typeof other === 'string') {
      const wanted = other.toLowerCase();
      return (
        this.id?.toLowerCase() === wanted ||
        this.displayName?.toLowerCase() === wanted
      );
    }
    return super.equals(other);
  }
}

export class Device extends Entity {
  static readonly resource: string = 'device';
  static readonly relations: RelationMap = Object.freeze({
    deviceType: DeviceType,
  });

  /**
   * A bare device id is placed under its owning patient when the record
   * names one (`patient-<patientId>,device-<id>`).
   */
  static override identify(rawId: string, attributes: RawRecord): ResourceId {
    const patientId = attributes['patientId'];
    if (rawId.includes(',') || typeof patientId !== 'string' || patientId.length === 0) {
      return ResourceId.parse(rawId, Device.resource);
    }
    const relative = rawId.includes('-') ? rawId : `device-${rawId}`;
    return ResourceId.of(ResourceId.parse(patientId, 'patient').principal, relative);
  }

  get alias(): string | undefined {
    return this.optionalString('alias');
  }

  get deviceType(): DeviceType | undefined {
    const deviceType = this.has('deviceType') ? this.get('deviceType') : undefined;
    return deviceType instanceof DeviceType ? deviceType : undefined;
  }

  /**
   * Unqualified id of the owning patient.
   */
  get patientId(): string | undefined {
    return this.optionalString('patientId');
  }

  get disabled(): boolean {
    return this.has('disabled') && this.get('disabled') === true;
  }
}

/**
 * Devices keyed by absolute id. A collection scoped to a patient resolves
 * bare device ids under that patient and reports relative ids.
 */
export class DeviceCollection extends EntityCollection<Device> {
  constructor(
    devices: Iterable<Device> = [],
    readonly patientId?: ResourceId
  ) {
    super(Device, devices);
  }

  protected override resolveKey(id: string | ResourceId): string | undefined {
    if (id instanceof ResourceId || id.includes(',')) {
      return ResourceId.parse(id).toString();
    }
    if (this.patientId) {
      const relative = id.includes('-') ? id : `device-${id}`;
      return ResourceId.of(this.patientId.principal, relative).toString();
    }
    return undefined;
  }

  /**
   * Devices identified without their patient are keyed under the scoping
   * patient.
   */
  protected override keyFor(device: Device): string | undefined {
    const resourceId = device.resourceId;
    if (this.patientId && resourceId && resourceId.relative === undefined) {
      return ResourceId.of(this.patientId.principal, resourceId.principal).toString();
    }
    return device.key;
  }

  override *ids(): Generator<string, void, undefined> {
    for (const device of this) {
      const id = this.patientId ? device.id : device.key;
      if (id !== undefined) {
        yield id;
      }
    }
  }

  protected override spawn(): DeviceCollection {
    return new DeviceCollection([], this.patientId);
  }
}
