/**
 * Relation builder functions for paginated relation fields.
 * Supports forward relations (the parent stores target identifiers) and
 * reverse relations (the target is looked up through one of its handlers).
 *
 * @module schema/relations
 * @category Schema
 *
 * @example
 * ```typescript
 * import { defineResource, field, forwardRelation, finderRelation } from 'restgraph/schema';
 *
 * const Courses = defineResource('courses', 1, {
 *   handlers: [handler.multiGet()],
 *   fields: { id: field.id(), name: field.string() },
 *   relations: {
 *     instructors: forwardRelation('instructors.v1'),
 *     sessions: finderRelation('sessions.v1', 'byCourse', { courseId: '$id' }),
 *   },
 * });
 * ```
 */

import type { RelationField, RelationType } from './types';

/**
 * Options shared by all relation builders
 */
export interface RelationOptions {
  description?: string;
}

/**
 * Defines a forward relation: the parent element holds a list of target
 * identifiers under this field's name, resolved through the target's
 * MULTI_GET handler.
 *
 * @param target - Key of the target resource (e.g. 'instructors.v1')
 *
 * @example
 * ```typescript
 * // courses.v1 elements carry `instructors: ['i1', 'i2']`
 * relations: {
 *   instructors: forwardRelation('instructors.v1'),
 * }
 * ```
 */
export function forwardRelation(target: string, options?: RelationOptions): RelationField {
  return {
    target,
    relation: { kind: 'forward', target },
    description: options?.description,
  };
}

/**
 * Defines a reverse relation looked up through the target resource.
 * Every key of `args` is bound by the relation and is not offered to callers.
 *
 * @param target - Key of the target resource
 * @param relationType - Which lookup serves the relation
 * @param args - Parameter bindings for the lookup
 */
export function reverseRelation(
  target: string,
  relationType: RelationType,
  args: Record<string, string> = {},
  options?: RelationOptions
): RelationField {
  return {
    target,
    relation: { kind: 'reverse', relationType, arguments: { ...args } },
    description: options?.description,
  };
}

/**
 * Shorthand for a reverse relation served by a finder of the target.
 *
 * @param finderName - Name of the FINDER handler, bound as `q`
 *
 * @example
 * ```typescript
 * relations: {
 *   sessions: finderRelation('sessions.v1', 'byCourse', { courseId: '$id' }),
 * }
 * ```
 */
export function finderRelation(
  target: string,
  finderName: string,
  args: Record<string, string> = {},
  options?: RelationOptions
): RelationField {
  return reverseRelation(target, 'FINDER', { ...args, q: finderName }, options);
}
