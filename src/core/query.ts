/**
 * Query objects
 *
 * A query binds a raw record source to an entity type and to the session's
 * caching and freeze-time policy. Iterating a query serves a complete
 * cached collection when caching is on, and otherwise streams records page
 * by page without materializing the result.
 */

import { RawRecord } from '../types';
import {
  Conditions,
  EntityCollection,
  isCreatedBefore,
  matchesConditions,
  requireConditions,
} from './collection';
import { Entity } from './entity';

/**
 * The session state a query consults.
 */
export interface QueryContext {
  readonly caching: boolean;
  /**
   * Freeze point in unix seconds, or null when time is not frozen.
   */
  readonly frozenAt: number | null;
}

export abstract class Query<
  E extends Entity,
  C extends EntityCollection<E> = EntityCollection<E>,
> implements AsyncIterable<E>
{
  constructor(protected readonly context: QueryContext) {}

  /**
   * Records straight from the API, one page in flight at a time. Always
   * performs a round trip.
   */
  abstract rawQuery(): AsyncGenerator<RawRecord, void, undefined>;

  /**
   * Point lookup by id.
   */
  abstract get(id: string): Promise<E>;

  protected abstract wrap(record: RawRecord): E;

  protected abstract createCollection(): C;

  /**
   * The cache slot this query reads and repopulates.
   */
  protected abstract readCache(): C;

  protected abstract writeCache(collection: C): void;

  async *[Symbol.asyncIterator](): AsyncGenerator<E, void, undefined> {
    const { frozenAt } = this.context;

    if (this.context.caching) {
      let cache = this.readCache();
      if (!cache.complete) {
        cache = await this.query();
        this.writeCache(cache);
      }
      yield* frozenAt === null ? cache : cache.createdBefore(frozenAt);
      return;
    }

    for await (const record of this.rawQuery()) {
      const entity = this.wrap(record);
      if (frozenAt === null || isCreatedBefore(entity, frozenAt)) {
        yield entity;
      }
    }
  }

  /**
   * Run the full raw query and assemble a complete collection. The session
   * cache is left alone.
   */
  async query(): Promise<C> {
    const collection = this.createCollection();
    for await (const record of this.rawQuery()) {
      collection.add(this.wrap(record));
    }
    collection.markComplete();
    return collection;
  }

  /**
   * Lazily filter the iteration by exact attribute match.
   *
   * @throws UsageError when no condition is given
   */
  findAllBy(conditions: Conditions): AsyncGenerator<E, void, undefined> {
    requireConditions(conditions);
    return this.matching(conditions);
  }

  private async *matching(
    conditions: Conditions
  ): AsyncGenerator<E, void, undefined> {
    for await (const entity of this) {
      if (matchesConditions(entity, conditions)) {
        yield entity;
      }
    }
  }

  async toArray(): Promise<E[]> {
    const entities: E[] = [];
    for await (const entity of this) {
      entities.push(entity);
    }
    return entities;
  }
}
