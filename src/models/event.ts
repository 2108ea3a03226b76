/**
 * Events logged by patients: activities, medications, symptoms, wellbeing
 * check-ins and free-text notes.
 */

import { RawRecord } from '../types';
import { Entity } from '../core/entity';
import { UsageError } from '../errors';
import { isRecord } from '../utils/response-handler';

/**
 * Three-level event classification. `enum` is absent for categories without
 * an enumeration.
 */
export interface EventClassification {
  namespace: string;
  category: string;
  enum?: string;
}

const REQUIRED_CLASSIFICATION_KEYS = ['namespace', 'category'];

export class Event extends Entity {
  static readonly resource: string = 'event';
  static readonly compoundIds: boolean = false;

  /**
   * @throws UsageError when the classification lacks a namespace or category
   */
  constructor(attributes: RawRecord) {
    const classification = attributes['classification'];
    const missing = REQUIRED_CLASSIFICATION_KEYS.filter(
      key => !isRecord(classification) || !(key in classification)
    );
    if (missing.length > 0) {
      throw new UsageError(
        `event classification is missing required keys: ${missing.join(', ')}`
      );
    }
    super(attributes);
  }

  get patientId(): string | undefined {
    return this.optionalString('patientId');
  }

  get displayName(): string | undefined {
    return this.optionalString('displayName');
  }

  get startTime(): number | undefined {
    return this.optionalNumber('startTime');
  }

  get endTime(): number | undefined {
    return this.optionalNumber('endTime');
  }

  get method(): string | undefined {
    return this.optionalString('method');
  }

  get classification(): EventClassification {
    const raw = this.get('classification');
    const record = isRecord(raw) ? raw : {};
    const enumeration = record['enum'];
    return {
      namespace: String(record['namespace']),
      category: String(record['category']),
      ...(typeof enumeration === 'string' ? { enum: enumeration } : {}),
    };
  }

  get payload(): RawRecord {
    const payload = this.has('payload') ? this.get('payload') : undefined;
    return isRecord(payload) ? payload : {};
  }

  get tags(): string[] {
    const tags = this.has('tags') ? this.get('tags') : [];
    return Array.isArray(tags)
      ? tags.filter((tag: unknown): tag is string => typeof tag === 'string')
      : [];
  }
}
