/**
 * Patient queries over every patient the caller can access.
 */

import { RawRecord } from '../types';
import { Query } from '../core/query';
import { ResourceId } from '../core/resource-id';
import { NotFoundError } from '../errors';
import { Patient, PatientCollection } from '../models/patient';
import { Session } from './session';

export class PatientQuery extends Query<Patient, PatientCollection> {
  constructor(private readonly session: Session) {
    super(session);
  }

  rawQuery(): AsyncGenerator<RawRecord, void, undefined> {
    return this.session.graph.listPatients();
  }

  /**
   * Fetch a patient by id, from the cache when caching is on.
   *
   * @throws NotFoundError when the API has no such patient
   */
  async get(id: string): Promise<Patient> {
    const cache = this.session.caching ? this.readCache() : undefined;
    if (cache?.has(id)) {
      return cache.get(id);
    }

    const record = await this.session.graph.fetchPatient(
      ResourceId.parse(Patient.qualify(id))
    );
    if (record === null) {
      throw new NotFoundError(`patient not found: ${id}`);
    }

    const patient = this.wrap(record);
    cache?.add(patient);
    return patient;
  }

  protected wrap(record: RawRecord): Patient {
    return new Patient(record).attach(this.session);
  }

  protected createCollection(): PatientCollection {
    return new PatientCollection();
  }

  protected readCache(): PatientCollection {
    return this.session.patientCache;
  }

  protected writeCache(collection: PatientCollection): void {
    this.session.patientCache = collection;
  }
}
