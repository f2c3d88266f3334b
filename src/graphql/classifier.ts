/**
 * Relation classification: which handler of the target resource serves a
 * paginated relation field.
 *
 * @module graphql/classifier
 * @category GraphQL
 */

import {
  err,
  missingFinderParameter,
  missingMultiGetHandler,
  ok,
  paginationNotSupported,
  type Result,
} from '../errors';
import type { Handler, RelationSpec, RelationType, ResourceDescriptor } from '../schema/types';
import { assertNever, resourceKey } from '../schema/types';

/**
 * Annotation argument naming the finder that serves a FINDER relation.
 */
export const FINDER_ARGUMENT = 'q';

function findMultiGet(resource: ResourceDescriptor, fieldName: string): Result<Handler> {
  const handler = resource.handlers.find((h) => h.kind === 'MULTI_GET');
  return handler ? ok(handler) : err(missingMultiGetHandler(resourceKey(resource), fieldName));
}

function classifyReverse(
  resource: ResourceDescriptor,
  fieldName: string,
  relationType: RelationType,
  args: Readonly<Record<string, string>>
): Result<Handler> {
  switch (relationType) {
    case 'FINDER': {
      const finderName = args[FINDER_ARGUMENT];
      const handler = finderName === undefined
        ? undefined
        : resource.handlers.find((h) => h.name === finderName && h.kind === 'FINDER');
      return handler ? ok(handler) : err(missingFinderParameter(resourceKey(resource), fieldName));
    }
    case 'MULTI_GET':
      return findMultiGet(resource, fieldName);
    case 'GET':
    case 'SINGLE_ELEMENT_FINDER':
    case 'UNKNOWN':
      return err(paginationNotSupported(resourceKey(resource), fieldName));
    default:
      return assertNever(relationType);
  }
}

/**
 * Choose the handler that produces the paginated collection for a field.
 *
 * Priority: an explicit override wins; a forward relation or no relation
 * needs the resource's MULTI_GET handler; a reverse relation is served by
 * the finder its `q` argument names, or by MULTI_GET. Single-element
 * relation kinds cannot be paginated.
 *
 * @param resource - The target resource
 * @param fieldName - Field under construction, for error reporting
 * @param handlerOverride - Handler to use regardless of the relation
 * @param relation - Relation the field was declared with, if any
 *
 * @example
 * ```typescript
 * const result = classifyHandler(sessions, 'sessions', undefined, {
 *   kind: 'reverse',
 *   relationType: 'FINDER',
 *   arguments: { q: 'byCourse', courseId: '$id' },
 * });
 * if (result.ok) console.log(result.value.name); // 'byCourse'
 * ```
 */
export function classifyHandler(
  resource: ResourceDescriptor,
  fieldName: string,
  handlerOverride?: Handler,
  relation?: RelationSpec
): Result<Handler> {
  if (handlerOverride) {
    return ok(handlerOverride);
  }

  if (!relation) {
    return findMultiGet(resource, fieldName);
  }

  switch (relation.kind) {
    case 'forward':
      return findMultiGet(resource, fieldName);
    case 'reverse':
      return classifyReverse(resource, fieldName, relation.relationType, relation.arguments);
    default:
      return assertNever(relation);
  }
}
