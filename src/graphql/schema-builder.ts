/**
 * Schema Builder - Assembles a GraphQL schema from registered resources
 *
 * Each root field is built on its own: a field that fails is reported and
 * left out while the rest of the schema is still produced.
 *
 * @module graphql/schema-builder
 * @category GraphQL
 */

import {
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLString,
  type GraphQLFieldConfigMap,
} from 'graphql';
import { getLogger } from '../config';
import { nameConflict, type SchemaError } from '../errors';
import type { ExecutionContext } from '../runtime/context';
import type { SchemaMetadata } from '../runtime/registry';
import type { Handler, ResourceDescriptor } from '../schema/types';
import { resourceKey } from '../schema/types';
import { formatRootFieldName } from './naming';
import { buildPaginatedField, toFieldConfig, type FieldSource } from './paginated-field';
import { TypeCache } from './type-cache';

/**
 * Result of a schema build.
 */
export interface SchemaBuildResult {
  schema: GraphQLSchema;
  /** One entry per root or relation field that could not be built */
  errors: SchemaError[];
  /** Root query fields that were built */
  rootFields: string[];
}

/**
 * Options for a schema build
 */
export interface SchemaBuildOptions {
  /** Name of the root query type (default: 'Query') */
  queryTypeName?: string;
}

interface RootFieldPlan {
  fieldName: string;
  resource: ResourceDescriptor;
  handlerOverride?: Handler;
}

/**
 * Root fields offered for a resource: one served by MULTI_GET, and one per
 * FINDER handler.
 */
function planRootFields(resource: ResourceDescriptor): RootFieldPlan[] {
  const plans: RootFieldPlan[] = [{ fieldName: formatRootFieldName(resource), resource }];
  for (const handler of resource.handlers) {
    if (handler.kind === 'FINDER') {
      plans.push({ fieldName: formatRootFieldName(resource, handler.name), resource, handlerOverride: handler });
    }
  }
  return plans;
}

/**
 * Build a GraphQL schema exposing every registered resource as paginated
 * root fields.
 *
 * @example
 * ```typescript
 * const { schema, errors } = buildGraphQLSchema(registry);
 * const result = await graphql({
 *   schema,
 *   source: '{ coursesV1 { elements { id name } paging { next } } }',
 *   contextValue: context,
 * });
 * ```
 */
export function buildGraphQLSchema(metadata: SchemaMetadata, options: SchemaBuildOptions = {}): SchemaBuildResult {
  const logger = getLogger();
  const cache = new TypeCache();
  const errors: SchemaError[] = [];
  const rootFields: string[] = [];
  // Root field name → resource key that owns it
  const rootOwners = new Map<string, string>([['_resources', 'Query']]);
  const resources = metadata.getResources();

  const fields: GraphQLFieldConfigMap<FieldSource, ExecutionContext> = {
    _resources: {
      type: new GraphQLNonNull(new GraphQLList(new GraphQLNonNull(GraphQLString))),
      description: 'Keys of the registered resources',
      resolve: () => resources.map(resourceKey),
    },
  };

  for (const resource of resources) {
    const key = resourceKey(resource);
    for (const plan of planRootFields(resource)) {
      const owner = rootOwners.get(plan.fieldName);
      if (owner !== undefined) {
        const error = nameConflict(key, plan.fieldName, owner, plan.fieldName);
        logger.warn(`Skipping root field '${plan.fieldName}': ${error.message}`, { resource: key, kind: error.kind });
        errors.push(error);
        continue;
      }

      const built = buildPaginatedField(metadata, key, plan.fieldName, {
        handlerOverride: plan.handlerOverride,
        cache,
      });

      if (!built.ok) {
        logger.warn(`Skipping root field '${plan.fieldName}': ${built.error.message}`, {
          resource: built.error.resourceName,
          kind: built.error.kind,
        });
        errors.push(built.error);
        continue;
      }

      fields[plan.fieldName] = toFieldConfig(built.value);
      rootFields.push(plan.fieldName);
      rootOwners.set(plan.fieldName, key);
      logger.debug(`Built root field '${plan.fieldName}'`, {
        resource: key,
        handler: built.value.handler.name,
      });
    }
  }

  const schema = new GraphQLSchema({
    query: new GraphQLObjectType<FieldSource, ExecutionContext>({
      name: options.queryTypeName ?? 'Query',
      fields,
    }),
  });

  // Constructing the schema walks every type, so relation failures are known here.
  errors.push(...cache.errors);

  return { schema, errors, rootFields };
}
