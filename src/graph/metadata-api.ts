/**
 * Metadata API operations used by the query objects
 *
 * Each listing is an async generator over raw records, one GraphQL page in
 * flight at a time.
 */

import { AuthMethod, MetadataTransport, RawRecord } from '../types';
import { ResourceId } from '../core/resource-id';
import { iterateCursor } from '../core/paginator';
import { ResponseHandler } from '../utils/response-handler';
import {
  FETCH_PATIENT,
  LIST_PATIENT_DEVICES,
  LIST_PATIENTS,
  WHOAMI_PATIENT,
  WHOAMI_USER,
} from './queries';

export interface MetadataApiOptions {
  /**
   * Client-key credentials belong to a patient; every other method
   * authenticates a user.
   */
  authMethod?: AuthMethod;
}

export type WhoamiResult =
  | { kind: 'patient'; record: RawRecord }
  | { kind: 'user'; record: RawRecord };

export class MetadataApi {
  constructor(
    readonly transport: MetadataTransport,
    private readonly options: MetadataApiOptions = {}
  ) {}

  listPatients(): AsyncGenerator<RawRecord, void, undefined> {
    return iterateCursor(async cursor => {
      const data = await this.transport.execute(LIST_PATIENTS, { cursor });
      const connection = ResponseHandler.path(data, 'org', 'patientAccessList');
      return {
        items: ResponseHandler.records(connection['patientAccess']).map(access =>
          ResponseHandler.record(access['patient'])
        ),
        endCursor: ResponseHandler.endCursor(connection),
      };
    });
  }

  /**
   * Enabled devices of one patient. Each record gains the owner's
   * unqualified `patientId`.
   */
  listPatientDevices(patientId: ResourceId): AsyncGenerator<RawRecord, void, undefined> {
    const owner = patientId.unqualified;
    return iterateCursor(async cursor => {
      const data = await this.transport.execute(LIST_PATIENT_DEVICES, {
        patientId: patientId.toString(),
        withDisabled: false,
        cursor,
      });
      const connection = ResponseHandler.path(data, 'patient', 'deviceList');
      return {
        items: ResponseHandler.records(connection['devices']).map(device => ({
          ...device,
          patientId: owner,
        })),
        endCursor: ResponseHandler.endCursor(connection),
      };
    });
  }

  /**
   * The patient record, or null when the API has none.
   */
  async fetchPatient(patientId: ResourceId): Promise<RawRecord | null> {
    const data = await this.transport.execute(FETCH_PATIENT, {
      patientId: patientId.toString(),
    });
    const patient = data['patient'];
    return ResponseHandler.records([patient])[0] ?? null;
  }

  async whoami(): Promise<WhoamiResult> {
    const statement =
      this.options.authMethod === 'client_keys' ? WHOAMI_PATIENT : WHOAMI_USER;
    const data = await this.transport.execute(statement);

    const patient = data['patient'];
    if (patient !== undefined && patient !== null) {
      return { kind: 'patient', record: ResponseHandler.record(patient) };
    }
    return { kind: 'user', record: ResponseHandler.record(data['user']) };
  }
}
