/**
 * Response Handler
 *
 * Narrowing helpers for the untyped JSON the APIs return. Missing branches of
 * a GraphQL result read as empty, so an absent list is an empty page rather
 * than an error.
 */

import { RawRecord } from '../types';
import { APIError } from '../errors';

export function isRecord(value: unknown): value is RawRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class ResponseHandler {
  /**
   * The value as a record, or an empty record when it is anything else.
   */
  static record(value: unknown): RawRecord {
    return isRecord(value) ? value : {};
  }

  /**
   * Walk a path of keys through nested records.
   */
  static path(value: unknown, ...keys: string[]): RawRecord {
    let current: RawRecord = ResponseHandler.record(value);
    for (const key of keys) {
      current = ResponseHandler.record(current[key]);
    }
    return current;
  }

  static requireRecord(value: unknown, context: string): RawRecord {
    if (!isRecord(value)) {
      throw new APIError(200, {
        type: 'UnexpectedResponse',
        message: `${context}: expected an object, got ${value === null ? 'null' : typeof value}`,
      });
    }
    return value;
  }

  /**
   * The record elements of a list; anything that is not a list reads as empty.
   */
  static records(value: unknown): RawRecord[] {
    return Array.isArray(value) ? value.filter(isRecord) : [];
  }

  /**
   * End cursor of a GraphQL connection (`pageInfo.endCursor`).
   */
  static endCursor(connection: RawRecord, field = 'endCursor'): string | null {
    const cursor = ResponseHandler.record(connection['pageInfo'])[field];
    return typeof cursor === 'string' && cursor.length > 0 ? cursor : null;
  }

  static optionalString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
  }

  static optionalNumber(value: unknown): number | undefined {
    return typeof value === 'number' ? value : undefined;
  }

  static parseJson(text: string, context: string): RawRecord {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new APIError(200, {
        type: 'InvalidResponse',
        message: `${context}: body is not JSON (${error instanceof Error ? error.message : String(error)})`,
      });
    }
    return ResponseHandler.requireRecord(parsed, context);
  }
}
