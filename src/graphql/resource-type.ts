/**
 * Element object types for resources.
 *
 * @module graphql/resource-type
 * @category GraphQL
 */

import {
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  type GraphQLFieldConfigMap,
  type GraphQLOutputType,
} from 'graphql';
import { getLogger } from '../config';
import { err, nameConflict, ok, resourceNotFound, schemaMissing, type Result } from '../errors';
import type { ExecutionContext } from '../runtime/context';
import type { SchemaMetadata } from '../runtime/registry';
import type { DataObject, ScalarField } from '../schema/types';
import { resourceKey } from '../schema/types';
import { scalarType } from './arguments';
import { formatResourceTypeName } from './naming';
import { buildPaginatedField, toFieldConfig } from './paginated-field';
import type { ElementType, TypeCache } from './type-cache';

function outputType(field: ScalarField): GraphQLOutputType {
  const scalar = scalarType(field.type);
  const base = field.list ? new GraphQLList(new GraphQLNonNull(scalar)) : scalar;
  return field.nullable ? base : new GraphQLNonNull(base);
}

/**
 * Object type of one element of a resource, named like 'CoursesV1'.
 *
 * Scalar fields map onto GraphQL scalars. Each relation becomes a paginated
 * field; a relation that cannot be built is logged and left out.
 */
export function getElementType(
  metadata: SchemaMetadata,
  resourceName: string,
  cache: TypeCache
): Result<ElementType> {
  const resource = metadata.getResource(resourceName);
  if (!resource) {
    return err(resourceNotFound(resourceName));
  }
  const schema = metadata.getSchema(resource);
  if (!schema) {
    return err(schemaMissing(resourceName));
  }

  const key = resourceKey(resource);
  const typeName = formatResourceTypeName(resource);
  const owner = cache.conflict(typeName, key);
  if (owner !== undefined) {
    return err(nameConflict(key, typeName, owner));
  }

  const type = cache.element(typeName, key, () => new GraphQLObjectType<DataObject, ExecutionContext>({
    name: typeName,
    description: resource.description,
    fields: () => {
      const fields: GraphQLFieldConfigMap<DataObject, ExecutionContext> = {};

      for (const [name, field] of Object.entries(schema.fields)) {
        fields[name] = { type: outputType(field), description: field.description };
      }

      for (const [name, relationField] of Object.entries(schema.relations)) {
        const built = buildPaginatedField(metadata, relationField.target, name, {
          relation: relationField.relation,
          cache,
        });
        if (!built.ok) {
          getLogger().warn(`Skipping relation '${key}.${name}': ${built.error.message}`, {
            resource: key,
            field: name,
            kind: built.error.kind,
          });
          cache.report(built.error);
          continue;
        }
        fields[name] = { ...toFieldConfig(built.value), description: relationField.description };
      }

      return fields;
    },
  }));

  return ok(type);
}
