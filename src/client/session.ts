/**
 * Session
 *
 * Entry point of the lazy query API. A session owns the patient cache and
 * the freeze point that every query consults, and resolves the caller's own
 * identity once.
 */

import { AuthMethod, Logger, MetadataTransport, TimeInput } from '../types';
import { QueryContext } from '../core/query';
import { MetadataApi } from '../graph/metadata-api';
import { Patient, PatientCollection } from '../models/patient';
import { User } from '../models/user';
import { defaultLogger } from '../utils/logger';
import { nowInSeconds, toUnixSeconds } from '../utils/time';
import { DeviceQuery } from './device-query';
import { PatientQuery } from './patient-query';

export interface SessionOptions {
  /**
   * Read-through caching of query results; on unless turned off.
   */
  caching?: boolean;
  /**
   * Credentials in use, which decide how `me()` asks for the caller's
   * identity.
   */
  authMethod?: AuthMethod;
  logger?: Logger;
}

export class Session implements QueryContext {
  readonly graph: MetadataApi;

  /**
   * Every patient known to the session; complete only after a full scan.
   */
  patientCache = new PatientCollection();

  private cachingEnabled: boolean;
  private freezePoint: number | null = null;
  private identity?: Patient | User;
  private logger: Logger;

  constructor(transport: MetadataTransport, options: SessionOptions = {}) {
    this.graph = new MetadataApi(transport, { authMethod: options.authMethod });
    this.cachingEnabled = options.caching ?? true;
    this.logger = options.logger ?? defaultLogger;
  }

  get caching(): boolean {
    return this.cachingEnabled;
  }

  set caching(enabled: boolean) {
    this.cachingEnabled = enabled;
  }

  get frozenAt(): number | null {
    return this.freezePoint;
  }

  /**
   * Hide everything created at or after `at` (now, when omitted) from query
   * iteration. Cached results stay valid.
   */
  freezeTime(at?: TimeInput): void {
    this.freezePoint = at === undefined ? nowInSeconds() : toUnixSeconds(at);
    this.logger.debug(`Session time frozen at ${this.freezePoint}`);
  }

  /**
   * Clear the freeze point. The patient cache can no longer be trusted to be
   * complete and is reset.
   */
  unfreezeTime(): void {
    this.freezePoint = null;
    this.patientCache = new PatientCollection();
    this.logger.debug('Session time unfrozen; patient cache reset');
  }

  get patients(): PatientQuery {
    return new PatientQuery(this);
  }

  /**
   * Devices across every accessible patient.
   */
  get devices(): DeviceQuery {
    return new DeviceQuery(this);
  }

  /**
   * The patient or user whose credentials the session uses. Resolved with
   * one API call, then remembered.
   */
  async me(): Promise<Patient | User> {
    if (this.identity) {
      return this.identity;
    }

    const result = await this.graph.whoami();
    this.identity =
      result.kind === 'patient'
        ? new Patient(result.record).attach(this)
        : new User(result.record);
    return this.identity;
  }
}
