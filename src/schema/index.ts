/**
 * Resource DSL - describe versioned REST resources and their relations
 *
 * @module schema
 * @category Schema
 *
 * @example
 * ```typescript
 * import { defineResource, field, handler, param, forwardRelation, finderRelation } from 'restgraph/schema';
 *
 * const Instructors = defineResource('instructors', 1, {
 *   handlers: [handler.multiGet(), handler.finder('byCourse', [param.id('courseId').required()])],
 *   fields: { id: field.id(), fullName: field.string() },
 * });
 *
 * const Courses = defineResource('courses', 1, {
 *   handlers: [handler.multiGet()],
 *   fields: { id: field.id(), name: field.string() },
 *   relations: {
 *     instructors: forwardRelation('instructors.v1'),
 *     teachingStaff: finderRelation('instructors.v1', 'byCourse', { courseId: '$id' }),
 *   },
 * });
 * ```
 */

// Type definitions
export * from './types';

// Builders
export { field, param, handler, toScalarField, toHandlerParameter } from './field';
export type { FieldBuilder, ParameterBuilder } from './field';

// Relation builders
export { forwardRelation, reverseRelation, finderRelation } from './relations';
export type { RelationOptions } from './relations';

// Resource definition
export { defineResource } from './define-resource';
export type { ResourceOptions } from './define-resource';
