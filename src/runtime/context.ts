/**
 * Execution Context - The already-fetched response a query resolves from
 *
 * The fetch layer populates a response before execution starts; resolution
 * only reads it, so one context is safely shared by concurrently resolving
 * fields.
 *
 * @module runtime/context
 * @category Runtime
 */

import type { DataObject, Identifier, ResourceName } from '../schema/types';
import { resourceKey } from '../schema/types';

/**
 * Selection under which a root field was requested.
 */
export interface RequestSelection {
  /** Field name in the query */
  name: string;
  /** Alias in the query, if any */
  alias?: string;
  /** Arguments bound at the selection */
  args?: Readonly<Record<string, unknown>>;
}

/**
 * One request issued for a root field.
 */
export interface TopLevelRequest {
  /** Key of the requested resource */
  resource: string;
  selection: RequestSelection;
}

/**
 * Pagination metadata returned with a top-level response.
 */
export interface ResponsePagination {
  /** Cursor of the next page */
  next?: string;
  /** Total number of elements, when the server reports it */
  total?: number;
}

/**
 * What a top-level request returned: identifiers in response order.
 */
export interface TopLevelResponse {
  ids: readonly Identifier[];
  pagination?: ResponsePagination;
}

/**
 * Fetched data for one query.
 */
export interface FetchedResponse {
  /** Resource key → (identifier string form → object) */
  readonly data: ReadonlyMap<string, ReadonlyMap<string, DataObject>>;
  /** Root requests in the order they were issued */
  readonly topLevelResponses: ReadonlyArray<readonly [TopLevelRequest, TopLevelResponse]>;
}

/**
 * Per-query context handed to the GraphQL executor as `contextValue`.
 */
export interface ExecutionContext {
  readonly response: FetchedResponse;
}

/**
 * Key under which an identifier is stored in a fetched-objects map.
 */
export function identifierKey(id: Identifier): string {
  return String(id);
}

/**
 * Accumulates fetched data and produces an immutable {@link ExecutionContext}.
 *
 * @example
 * ```typescript
 * const context = new ResponseBuilder()
 *   .addObjects('courses.v1', [{ id: 'c1', name: 'Algebra' }])
 *   .addTopLevel({ resource: 'courses.v1', selection: { name: 'coursesV1' } }, { ids: ['c1'] })
 *   .build();
 * ```
 */
export class ResponseBuilder {
  private data = new Map<string, Map<string, DataObject>>();
  private topLevel: Array<readonly [TopLevelRequest, TopLevelResponse]> = [];

  /**
   * Add fetched objects for a resource, keyed by `idField` (default 'id').
   * Objects without a usable identifier are skipped.
   */
  addObjects(resource: string | ResourceName, objects: DataObject[], idField = 'id'): this {
    const key = typeof resource === 'string' ? resource : resourceKey(resource);
    let byId = this.data.get(key);
    if (!byId) {
      byId = new Map();
      this.data.set(key, byId);
    }
    for (const object of objects) {
      const id = object[idField];
      if (typeof id === 'string' || typeof id === 'number') {
        byId.set(identifierKey(id), object);
      }
    }
    return this;
  }

  /**
   * Record a root request and the identifiers it returned.
   */
  addTopLevel(request: TopLevelRequest, response: TopLevelResponse): this {
    this.topLevel.push([request, response]);
    return this;
  }

  build(): ExecutionContext {
    const data = new Map<string, ReadonlyMap<string, DataObject>>();
    for (const [key, byId] of this.data) {
      data.set(key, new Map(byId));
    }
    return Object.freeze({
      response: Object.freeze({
        data,
        topLevelResponses: Object.freeze([...this.topLevel]),
      }),
    });
  }
}

/**
 * An execution context with no fetched data.
 */
export function emptyExecutionContext(): ExecutionContext {
  return new ResponseBuilder().build();
}
