/**
 * Paginated Relation Resolver - Computes the ordered page of elements for
 * one occurrence of a paginated relation field
 *
 * Root occurrences take their identifiers from the top-level request
 * recorded for the same selection; nested occurrences read them from the
 * parent element. Missing data never fails a page: it shortens it.
 *
 * @module runtime/resolver
 * @category Runtime
 */

import { getDefaults, getLogger } from '../config';
import type { DataObject, Identifier } from '../schema/types';
import { isIdentifier } from '../schema/types';
import type { ExecutionContext, ResponsePagination, TopLevelResponse } from './context';
import { identifierKey } from './context';

/**
 * Pagination arguments bound at an occurrence.
 */
export interface PageArgs {
  start?: string;
  limit?: number;
}

/**
 * What the connection type knows about the occurrence that produced it.
 */
export interface ParentLinkage {
  /** Resolved parent element; absent (or empty) for a root occurrence */
  parentValue?: DataObject | null;
  args: PageArgs;
  /** Name of the relation field in the schema */
  fieldName: string;
  /** Alias the query gave the field, if any */
  alias?: string;
  /** Key of the resource the page is drawn from */
  resource: string;
}

/**
 * A window over an identifier list.
 */
export interface IdentifierWindow {
  ids: Identifier[];
  /** Identifier immediately after the window, if any */
  next?: Identifier;
}

/**
 * Whether an occurrence is at the query root.
 */
export function isTopLevel(linkage: ParentLinkage): boolean {
  const parent = linkage.parentValue;
  return parent === undefined || parent === null || Object.keys(parent).length === 0;
}

/**
 * Find the top-level response recorded for this occurrence: same resource,
 * same selection name and same alias (both absent counts as equal).
 */
export function findTopLevelResponse(
  context: ExecutionContext,
  targetResource: string,
  fieldName: string,
  alias: string | undefined
): TopLevelResponse | undefined {
  const match = context.response.topLevelResponses.find(([request]) =>
    request.resource === targetResource &&
    request.selection.alias === alias &&
    request.selection.name === fieldName
  );
  return match?.[1];
}

/**
 * Identifiers a parent element references under `key`.
 * Non-list values and non-identifier entries are ignored.
 */
export function referencedIdentifiers(parent: DataObject, key: string): Identifier[] {
  const value = parent[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isIdentifier);
}

/**
 * Apply a cursor and a limit to an ordered identifier list.
 *
 * The cursor is inclusive and compared on the identifier's string form.
 * An unmatched cursor leaves the list whole.
 */
export function windowIdentifiers(ids: readonly Identifier[], start: string | undefined, limit: number): IdentifierWindow {
  let offset = 0;
  if (start !== undefined) {
    const index = ids.findIndex((id) => identifierKey(id) === start);
    if (index >= 0) {
      offset = index;
    } else {
      // TODO: confirm with product whether an unknown cursor should yield an empty page instead.
      getLogger().debug(`Cursor '${start}' not found; paging from the first identifier`, { start });
    }
  }

  const size = Math.max(0, Math.floor(limit));
  const end = offset + size;
  const window: IdentifierWindow = { ids: ids.slice(offset, end) };
  if (end < ids.length) {
    window.next = ids[end];
  }
  return window;
}

/**
 * Ordered identifiers for one occurrence, before objects are looked up.
 */
export function resolveIdentifiers(
  context: ExecutionContext,
  linkage: ParentLinkage,
  targetResource: string,
  fieldName: string = linkage.fieldName,
  limit: number = linkage.args.limit ?? getDefaults().limit,
  start: string | undefined = linkage.args.start
): Identifier[] {
  const parent = linkage.parentValue;

  if (parent === undefined || parent === null || isTopLevel(linkage)) {
    // Root pages are already windowed by the request that produced them.
    return [...(findTopLevelResponse(context, targetResource, fieldName, linkage.alias)?.ids ?? [])];
  }

  const allIds = referencedIdentifiers(parent, linkage.alias ?? fieldName);
  return windowIdentifiers(allIds, start, limit).ids;
}

/**
 * Resolve the elements of a paginated relation occurrence.
 *
 * @param context - Fetched response for the query
 * @param linkage - Parent element, bound arguments and selection
 * @param targetResource - Key of the target resource (e.g. 'instructors.v1')
 * @returns Fetched objects in identifier order; missing objects are skipped
 *
 * @example
 * ```typescript
 * const elements = resolveElements(context, {
 *   parentValue: { id: 'c1', instructors: [1, 2, 3, 4, 5] },
 *   args: { start: '3', limit: 2 },
 *   fieldName: 'instructors',
 *   resource: 'instructors.v1',
 * }, 'instructors.v1');
 * // objects for identifiers 3 and 4
 * ```
 */
export function resolveElements(
  context: ExecutionContext,
  linkage: ParentLinkage,
  targetResource: string,
  fieldName: string = linkage.fieldName,
  limit: number = linkage.args.limit ?? getDefaults().limit,
  start: string | undefined = linkage.args.start
): DataObject[] {
  const objects = context.response.data.get(targetResource);
  if (!objects) {
    return [];
  }

  const ids = resolveIdentifiers(context, linkage, targetResource, fieldName, limit, start);
  const elements: DataObject[] = [];
  for (const id of ids) {
    const object = objects.get(identifierKey(id));
    if (object !== undefined) {
      elements.push(object);
    }
  }
  return elements;
}

/**
 * Pagination metadata for one occurrence.
 *
 * Root occurrences report what the top-level response carried. Nested
 * occurrences report the size of the parent's identifier list and the
 * identifier following the returned window as the next cursor.
 */
export function resolvePaging(
  context: ExecutionContext,
  linkage: ParentLinkage,
  targetResource: string = linkage.resource
): ResponsePagination {
  const parent = linkage.parentValue;

  if (parent === undefined || parent === null || isTopLevel(linkage)) {
    const response = findTopLevelResponse(context, targetResource, linkage.fieldName, linkage.alias);
    return { ...(response?.pagination ?? {}) };
  }

  const allIds = referencedIdentifiers(parent, linkage.alias ?? linkage.fieldName);
  const window = windowIdentifiers(allIds, linkage.args.start, linkage.args.limit ?? getDefaults().limit);
  const paging: ResponsePagination = { total: allIds.length };
  if (window.next !== undefined) {
    paging.next = identifierKey(window.next);
  }
  return paging;
}
