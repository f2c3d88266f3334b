/**
 * Primary API for defining resource descriptors.
 *
 * @module schema/define-resource
 * @category Schema
 *
 * @example
 * ```typescript
 * import { defineResource, field, handler, param, forwardRelation } from 'restgraph/schema';
 *
 * const Courses = defineResource('courses', 1, {
 *   handlers: [
 *     handler.get(),
 *     handler.multiGet(),
 *     handler.finder('byName', [param.string('name').required()]),
 *   ],
 *   fields: {
 *     id: field.id(),
 *     name: field.string(),
 *   },
 *   relations: {
 *     instructors: forwardRelation('instructors.v1'),
 *   },
 * });
 * ```
 */

import type { ElementSchema, Handler, RelationField, ResourceDescriptor, ScalarField } from './types';
import { toScalarField, type FieldBuilder } from './field';
import { parseOrThrow, ResourceDescriptorSchema } from './validation';

/**
 * Options for a resource definition
 */
export interface ResourceOptions {
  handlers: Handler[];
  /**
   * Scalar fields of one element. Omit to declare a resource whose element
   * schema is unknown; paginated fields targeting it then fail with
   * `SchemaMissing`.
   */
  fields?: Record<string, FieldBuilder | ScalarField>;
  /** Paginated relation fields of one element */
  relations?: Record<string, RelationField>;
  description?: string;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Defines a resource descriptor. The result is validated and deeply frozen.
 *
 * An `id` field is added when `fields` is given without one.
 *
 * @param name - Resource name (e.g. 'courses')
 * @param version - Resource version (e.g. 1 for 'courses.v1')
 * @throws ResourceDefinitionError when the definition is malformed
 */
export function defineResource(name: string, version: number, options: ResourceOptions): ResourceDescriptor {
  let schema: ElementSchema | undefined;

  if (options.fields !== undefined) {
    const fields: Record<string, ScalarField> = {};
    for (const [key, value] of Object.entries(options.fields)) {
      fields[key] = toScalarField(value);
    }

    if (!fields.id) {
      fields.id = { type: 'id', list: false, nullable: false };
    }

    schema = { fields, relations: { ...(options.relations ?? {}) } };
  }

  const candidate: ResourceDescriptor = {
    name,
    version,
    handlers: options.handlers,
    schema,
    description: options.description,
  };

  const parsed: ResourceDescriptor = parseOrThrow(ResourceDescriptorSchema, candidate, `resource '${name}.v${version}'`);
  return deepFreeze(parsed);
}

