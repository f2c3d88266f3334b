/**
 * Paginated Resource Field - GraphQL field for a relation that pages over
 * another resource
 *
 * @module graphql/paginated-field
 * @category GraphQL
 */

import {
  GraphQLList,
  GraphQLObjectType,
  type GraphQLFieldConfig,
  type GraphQLFieldConfigMap,
  type GraphQLResolveInfo,
} from 'graphql';
import { getDefaults, getLogger } from '../config';
import { err, nameConflict, ok, resourceNotFound, schemaMissing, SchemaGenerationError, type Result } from '../errors';
import type { ExecutionContext } from '../runtime/context';
import type { SchemaMetadata } from '../runtime/registry';
import { resolveElements, type PageArgs, type ParentLinkage } from '../runtime/resolver';
import type { DataObject, Handler, RelationSpec } from '../schema/types';
import { resourceKey } from '../schema/types';
import { generateHandlerArguments, IDS_ARGUMENT, toFieldConfigArguments, type ArgumentDescriptor } from './arguments';
import { classifyHandler } from './classifier';
import { formatConnectionTypeName } from './naming';
import { LIMIT_ARGUMENT, ResponsePaginationType, START_ARGUMENT } from './pagination';
import { getElementType } from './resource-type';
import { TypeCache, type ConnectionType } from './type-cache';

/**
 * Source value of a field that may sit at the root or under an element.
 */
export type FieldSource = DataObject | null | undefined;

/**
 * Complexity estimator in graphql-query-complexity's field-extension shape.
 */
export type ComplexityEstimator = (options: { args: Record<string, unknown>; childComplexity: number }) => number;

/**
 * Everything a schema builder needs to install one paginated relation field.
 * Immutable once built; shared by all queries against the schema.
 */
export interface FieldDescriptor {
  readonly name: string;
  /** Handler that serves the collection */
  readonly handler: Handler;
  readonly arguments: readonly ArgumentDescriptor[];
  readonly type: ConnectionType;
  readonly resolve: (
    source: FieldSource,
    args: Record<string, unknown>,
    context: ExecutionContext,
    info: GraphQLResolveInfo
  ) => ParentLinkage;
  /** Cost of the field given a page size and the cost of one element */
  readonly complexity: (limit: number | undefined, childCost: number) => number;
  readonly extensions: { readonly complexity: ComplexityEstimator };
}

/**
 * Options for building a paginated field
 */
export interface PaginatedFieldOptions {
  /** Serve the field with this handler regardless of the relation */
  handlerOverride?: Handler;
  /** Relation the field was declared with */
  relation?: RelationSpec;
  /** Type cache shared by one schema build */
  cache?: TypeCache;
}

/**
 * Cost of a paginated relation. A page may fan out into `limit` element
 * fetches, each costing `childCost`; the factor prices the lookup itself.
 * Pages under ten elements cost as much as a page of ten.
 */
export function paginatedComplexity(limit: number, childCost: number, factor: number): number {
  return Math.max(Math.trunc(limit / 10), 1) * factor * childCost;
}

function pageArgs(args: Record<string, unknown>): PageArgs {
  const start = args[START_ARGUMENT];
  const limit = args[LIMIT_ARGUMENT];
  return {
    start: typeof start === 'string' ? start : undefined,
    limit: typeof limit === 'number' ? limit : undefined,
  };
}

/**
 * Build the descriptor of a paginated relation field.
 *
 * @param metadata - Resource lookup
 * @param resourceName - Key of the resource the field pages over (e.g. 'instructors.v1')
 * @param fieldName - Name of the field
 * @returns The field descriptor, or the schema error that prevented it
 *
 * @example
 * ```typescript
 * const result = buildPaginatedField(registry, 'instructors.v1', 'instructors', {
 *   relation: { kind: 'forward', target: 'instructors.v1' },
 * });
 * if (result.ok) {
 *   fields.instructors = toFieldConfig(result.value);
 * }
 * ```
 */
export function buildPaginatedField(
  metadata: SchemaMetadata,
  resourceName: string,
  fieldName: string,
  options: PaginatedFieldOptions = {}
): Result<FieldDescriptor> {
  const resource = metadata.getResource(resourceName);
  if (!resource) {
    return err(resourceNotFound(resourceName, fieldName));
  }
  if (!metadata.getSchema(resource)) {
    return err(schemaMissing(resourceName, fieldName));
  }

  const classified = classifyHandler(resource, fieldName, options.handlerOverride, options.relation);
  if (!classified.ok) {
    return classified;
  }
  const handler = classified.value;

  const key = resourceKey(resource);
  const cache = options.cache ?? new TypeCache();
  const connectionName = formatConnectionTypeName(resource);
  const owner = cache.conflict(connectionName, key);
  if (owner !== undefined) {
    return err(nameConflict(key, connectionName, owner, fieldName));
  }

  const boundArguments = new Set(
    options.relation?.kind === 'reverse' ? Object.keys(options.relation.arguments) : []
  );
  const args = generateHandlerArguments(handler, true)
    .filter((arg) => arg.name !== IDS_ARGUMENT)
    .filter((arg) => !boundArguments.has(arg.name));

  const { limit: defaultLimit, complexityFactor } = getDefaults();
  const complexity = (limit: number | undefined, childCost: number): number =>
    paginatedComplexity(limit ?? defaultLimit, childCost, complexityFactor);

  const descriptor: FieldDescriptor = {
    name: fieldName,
    handler,
    arguments: Object.freeze(args.map((arg) => Object.freeze(arg))),
    type: getConnectionType(metadata, key, cache),
    resolve: (source, fieldArgs, _context, info) => ({
      parentValue: source,
      args: pageArgs(fieldArgs),
      fieldName,
      alias: info.fieldNodes[0]?.alias?.value,
      resource: key,
    }),
    complexity,
    extensions: Object.freeze({
      complexity: ({ args: fieldArgs, childComplexity }: { args: Record<string, unknown>; childComplexity: number }) =>
        complexity(pageArgs(fieldArgs).limit, childComplexity),
    }),
  };

  return ok(Object.freeze(descriptor));
}

/**
 * Convert a descriptor to a graphql-js field config.
 */
export function toFieldConfig(descriptor: FieldDescriptor): GraphQLFieldConfig<FieldSource, ExecutionContext> {
  return {
    type: descriptor.type,
    args: toFieldConfigArguments(descriptor.arguments),
    resolve: descriptor.resolve,
    extensions: descriptor.extensions,
  };
}

/**
 * Connection type for a resource: `elements` and `paging`.
 *
 * Fields are produced on first use so resources that reference each other
 * can be built. If the element type cannot be resolved the connection has
 * no fields.
 *
 * @throws SchemaGenerationError when the resource or its schema is absent,
 * or when another resource already owns the connection's name
 */
export function getConnectionType(metadata: SchemaMetadata, resourceName: string, cache: TypeCache): ConnectionType {
  const resource = metadata.getResource(resourceName);
  if (!resource || !metadata.getSchema(resource)) {
    throw new SchemaGenerationError(resourceName);
  }

  const key = resourceKey(resource);
  const name = formatConnectionTypeName(resource);
  const owner = cache.conflict(name, key);
  if (owner !== undefined) {
    throw new SchemaGenerationError(resourceName, nameConflict(key, name, owner).message);
  }
  return cache.connection(name, key, () => new GraphQLObjectType<ParentLinkage, ExecutionContext>({
    name,
    fields: (): GraphQLFieldConfigMap<ParentLinkage, ExecutionContext> => {
      const elementType = getElementType(metadata, resourceName, cache);
      if (!elementType.ok) {
        getLogger().warn(`Connection for '${resourceName}' has no fields: ${elementType.error.message}`, {
          resource: resourceName,
          kind: elementType.error.kind,
        });
        cache.report(elementType.error);
        return {};
      }
      return {
        elements: {
          type: new GraphQLList(elementType.value),
          resolve: (linkage, _args, context) => resolveElements(context, linkage, resourceName),
        },
        paging: {
          type: ResponsePaginationType,
          resolve: (linkage) => linkage,
        },
      };
    },
  }));
}
