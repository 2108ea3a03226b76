/**
 * Core module exports
 */

export { ResourceId } from './resource-id';
export { Entity } from './entity';
export type { EntityClass, RelationMap } from './entity';
export {
  EntityCollection,
  isCreatedBefore,
  matchesConditions,
  requireConditions,
} from './collection';
export type { Conditions } from './collection';
export { Query } from './query';
export type { QueryContext } from './query';
export {
  NEXT_PAGE_TOKEN_HEADER,
  PAGE_TOKEN_PARAM,
  collectCursor,
  iterateCursor,
  paginateCursor,
  paginateStream,
} from './paginator';
export type {
  CursorFetcher,
  StreamPageFetcher,
  StreamPaginationOptions,
} from './paginator';
export { toCamelCase, toSnakeCase } from './casing';
