/**
 * Entity collections
 *
 * Insertion-ordered, deduplicated sets of entities keyed by identifier.
 * A collection also records whether it is known to hold every entity its
 * query matches, which is what lets a session trust a cached result.
 */

import { RawRecord, TimeInput } from '../types';
import { KeyNotFoundError, UsageError } from '../errors';
import { toUnixSeconds } from '../utils/time';
import { Entity, EntityClass } from './entity';
import { ResourceId } from './resource-id';

/**
 * Exact-match attribute conditions, keyed by field name in either casing.
 */
export type Conditions = Readonly<Record<string, unknown>>;

const PREVIEW_SIZE = 3;

export function requireConditions(conditions: Conditions): void {
  if (Object.keys(conditions).length === 0) {
    throw new UsageError('at least one filter condition is required');
  }
}

/**
 * Strict equality per field. A field holding an entity compares through the
 * entity's own `equals`.
 */
export function matchesConditions(
  entity: Entity,
  conditions: Conditions
): boolean {
  return Object.entries(conditions).every(([field, expected]) => {
    if (!entity.has(field)) {
      return false;
    }
    const actual = entity.get(field);
    if (actual instanceof Entity) {
      return actual.equals(expected);
    }
    return actual === expected;
  });
}

export function isCreatedBefore(entity: Entity, cutoff: number): boolean {
  const createdAt = entity.createdAt;
  return createdAt === undefined || createdAt < cutoff;
}

export class EntityCollection<E extends Entity = Entity> implements Iterable<E> {
  private readonly members = new Map<string, E>();
  private isComplete = false;

  constructor(
    protected readonly memberType: EntityClass<E>,
    entities: Iterable<E> = []
  ) {
    this.update(entities);
  }

  /**
   * Whether the collection is known to hold every entity its query matches.
   */
  get complete(): boolean {
    return this.isComplete;
  }

  markComplete(): void {
    this.isComplete = true;
  }

  get size(): number {
    return this.members.size;
  }

  /**
   * Insert or overwrite by identifier. An overwritten entity keeps its
   * original position.
   */
  add(entity: E): void {
    if (entity.constructor !== this.memberType) {
      throw new UsageError(
        `cannot add ${entity.constructor.name} to a collection of ${this.memberType.name}`
      );
    }
    const key = this.keyFor(entity);
    if (key === undefined) {
      throw new UsageError(
        `cannot add ${this.memberType.name} without an id to a collection`
      );
    }
    this.members.set(key, entity);
  }

  update(entities: Iterable<E>): void {
    for (const entity of entities) {
      this.add(entity);
    }
  }

  remove(entity: E | string | ResourceId): void {
    const key =
      entity instanceof Entity ? this.keyFor(entity) : this.resolveKey(entity);
    if (key === undefined || !this.members.delete(key)) {
      throw new KeyNotFoundError(
        entity instanceof Entity ? entity.key ?? '' : entity.toString()
      );
    }
  }

  /**
   * Key a member is stored under. Must agree with `resolveKey` for the
   * member's bare id.
   */
  protected keyFor(entity: E): string | undefined {
    return entity.key;
  }

  /**
   * Map a caller-supplied id to a member key. Subclasses qualify bare ids
   * for their resource type.
   */
  protected resolveKey(id: string | ResourceId): string | undefined {
    if (id instanceof ResourceId) {
      return id.toString();
    }
    if (!this.memberType.compoundIds) {
      return id;
    }
    return ResourceId.parse(id, this.memberType.resource).toString();
  }

  /**
   * @throws KeyNotFoundError when no member has the id
   */
  get(id: string | ResourceId): E {
    const key = this.resolveKey(id);
    const entity = key === undefined ? undefined : this.members.get(key);
    if (entity === undefined) {
      throw new KeyNotFoundError(id.toString());
    }
    return entity;
  }

  has(id: string | ResourceId): boolean {
    const key = this.resolveKey(id);
    return key !== undefined && this.members.has(key);
  }

  /**
   * Lazily yield the members matching every condition.
   *
   * @throws UsageError when no condition is given
   */
  filteredBy(conditions: Conditions): Generator<E, void, undefined> {
    requireConditions(conditions);
    return this.matching(conditions);
  }

  private *matching(conditions: Conditions): Generator<E, void, undefined> {
    for (const entity of this.members.values()) {
      if (matchesConditions(entity, conditions)) {
        yield entity;
      }
    }
  }

  /**
   * Members created strictly before `time`. Members without a creation time
   * are always included.
   */
  *createdBefore(time: TimeInput): Generator<E, void, undefined> {
    const cutoff = toUnixSeconds(time);
    for (const entity of this.members.values()) {
      if (isCreatedBefore(entity, cutoff)) {
        yield entity;
      }
    }
  }

  *ids(): Generator<string, void, undefined> {
    yield* this.members.keys();
  }

  [Symbol.iterator](): Iterator<E> {
    return this.members.values();
  }

  /**
   * An empty collection of the same kind, used for set algebra results.
   */
  protected spawn(): EntityCollection<E> {
    return new EntityCollection(this.memberType);
  }

  union(other: Iterable<E>): EntityCollection<E> {
    const result = this.spawn();
    result.update(this);
    result.update(other);
    return result;
  }

  intersection(other: EntityCollection<E>): EntityCollection<E> {
    const result = this.spawn();
    for (const [key, entity] of this.members) {
      if (other.members.has(key)) {
        result.add(entity);
      }
    }
    return result;
  }

  difference(other: EntityCollection<E>): EntityCollection<E> {
    const result = this.spawn();
    for (const [key, entity] of this.members) {
      if (!other.members.has(key)) {
        result.add(entity);
      }
    }
    return result;
  }

  toArray(): E[] {
    return Array.from(this.members.values());
  }

  toList(): RawRecord[] {
    return this.toArray().map(entity => entity.toDict());
  }

  toString(): string {
    const preview = this.toArray()
      .slice(0, PREVIEW_SIZE)
      .map(entity => entity.id ?? entity.key ?? '?');
    if (this.size > PREVIEW_SIZE) {
      preview.push('...');
    }
    return `${this.memberType.name}Collection(${this.size}) [${preview.join(', ')}]`;
  }
}
