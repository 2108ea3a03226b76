/**
 * Entity model
 *
 * An Entity wraps one record returned by the metadata API. Fields keep the
 * API's casing in the backing map and are resolved under either casing on
 * read. Declared relations are wrapped into nested entities when the record
 * is constructed.
 */

import { RawRecord } from '../types';
import { AttributeNotFoundError } from '../errors';
import { isRecord } from '../utils/response-handler';
import { toCamelCase, toSnakeCase } from './casing';
import { ResourceId } from './resource-id';

const INDENT = '    ';

/**
 * Constructor side of an entity type, as used by relations and collections.
 */
export interface EntityClass<E extends Entity = Entity> {
  new (attributes: RawRecord): E;
  readonly name: string;
  readonly resource: string;
  readonly compoundIds: boolean;
  readonly relations: RelationMap;
  identify(rawId: string, attributes: RawRecord): ResourceId;
}

export type RelationMap = Readonly<Record<string, EntityClass>>;

function isEntityList(value: unknown): value is Entity[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((item: unknown) => item instanceof Entity)
  );
}

function renderValue(value: unknown, indent: string): string {
  if (value instanceof Entity) {
    return value.render(indent);
  }
  if (isEntityList(value)) {
    const inner = indent + INDENT;
    return [
      '[',
      ...value.map(entity => `${inner}${entity.render(inner)}`),
      `${indent}]`,
    ].join('\n');
  }
  if (typeof value === 'string') {
    return value;
  }
  if (value !== null && typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function plainValue(value: unknown): unknown {
  if (value instanceof Entity) {
    return value.toDict();
  }
  if (Array.isArray(value)) {
    return value.map(plainValue);
  }
  return value;
}

export class Entity {
  /**
   * Resource type name: the hint for bare ids and the label in `toString()`.
   */
  static readonly resource: string = 'entity';

  /**
   * Whether `id` values are compound graph keys (`patient-a,device-1`). Types
   * whose ids are opaque strings turn this off and keep the id verbatim.
   */
  static readonly compoundIds: boolean = true;

  static readonly relations: RelationMap = Object.freeze({});

  /**
   * Build the identifier of a record's `id`. Bare ids take the resource
   * type as their prefix; types whose collections key on a different form
   * override this so that both sides agree.
   */
  static identify(rawId: string, _attributes: RawRecord): ResourceId {
    return ResourceId.parse(rawId, this.resource);
  }

  /**
   * Parsed identifier; undefined for records without a compound `id`.
   */
  readonly resourceId?: ResourceId;

  /**
   * Collection key: the serialized identifier, or the opaque id.
   */
  readonly key?: string;

  protected readonly entityType: EntityClass;
  private readonly attributes: RawRecord;

  /**
   * Takes ownership of `attributes`: the map is rewritten in place and must
   * not be reused by the caller.
   */
  constructor(attributes: RawRecord) {
    this.entityType = new.target;

    const rawId = attributes['id'];
    if (typeof rawId === 'string' && rawId.length > 0) {
      if (this.entityType.compoundIds) {
        this.resourceId = this.entityType.identify(rawId, attributes);
        this.key = this.resourceId.toString();
        attributes['id'] = this.resourceId.unqualified;
      } else {
        this.key = rawId;
      }
    }

    for (const [field, relation] of Object.entries(this.entityType.relations)) {
      const value = attributes[field];
      if (Array.isArray(value)) {
        attributes[field] = value.map((item: unknown) =>
          isRecord(item) && !(item instanceof Entity) ? new relation(item) : item
        );
      } else if (isRecord(value) && !(value instanceof Entity)) {
        attributes[field] = new relation(value);
      }
    }

    this.attributes = attributes;
  }

  get resource(): string {
    return this.entityType.resource;
  }

  /**
   * The unqualified id, as stored in the field map.
   */
  get id(): string | undefined {
    const id = this.attributes['id'];
    return typeof id === 'string' ? id : undefined;
  }

  /**
   * Creation time in unix seconds, if the record carries one.
   */
  get createdAt(): number | undefined {
    for (const field of ['createdAt', 'created_at', 'created']) {
      const value = this.attributes[field];
      if (typeof value === 'number') {
        return value;
      }
    }
    return undefined;
  }

  private resolveField(field: string): string | undefined {
    for (const candidate of [field, toCamelCase(field), toSnakeCase(field)]) {
      if (Object.prototype.hasOwnProperty.call(this.attributes, candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  has(field: string): boolean {
    return this.resolveField(field) !== undefined;
  }

  /**
   * Read a field by its API name or its snake_case form.
   *
   * @throws AttributeNotFoundError when the record has no such field
   */
  get(field: string): unknown {
    const resolved = this.resolveField(field);
    if (resolved === undefined) {
      throw new AttributeNotFoundError(field, this.resource);
    }
    return this.attributes[resolved];
  }

  protected optionalString(field: string): string | undefined {
    const resolved = this.resolveField(field);
    const value = resolved === undefined ? undefined : this.attributes[resolved];
    return typeof value === 'string' ? value : undefined;
  }

  protected optionalNumber(field: string): number | undefined {
    const resolved = this.resolveField(field);
    const value = resolved === undefined ? undefined : this.attributes[resolved];
    return typeof value === 'number' ? value : undefined;
  }

  fields(): string[] {
    return Object.keys(this.attributes);
  }

  /**
   * Entities are equal when they are of the same type and share an
   * identifier. A string matches either the serialized identifier or the
   * unqualified id.
   */
  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    if (other instanceof Entity) {
      return (
        other.entityType === this.entityType &&
        this.key !== undefined &&
        this.key === other.key
      );
    }
    if (other instanceof ResourceId) {
      return this.resourceId !== undefined && this.resourceId.equals(other);
    }
    if (typeof other === 'string') {
      return (
        this.key !== undefined && (this.key === other || this.id === other)
      );
    }
    return false;
  }

  toDict(): RawRecord {
    const result: RawRecord = {};
    for (const [field, value] of Object.entries(this.attributes)) {
      result[field] = plainValue(value);
    }
    return result;
  }

  /**
   * Indented, recursive rendering; `indent` is the indentation of the line
   * the rendering starts on.
   */
  render(indent = ''): string {
    const inner = indent + INDENT;
    const lines = [`${this.resource} {`];
    for (const [field, value] of Object.entries(this.attributes)) {
      lines.push(`${inner}${toSnakeCase(field)}: ${renderValue(value, inner)}`);
    }
    lines.push(`${indent}}`);
    return lines.join('\n');
  }

  toString(): string {
    return this.render();
  }
}
