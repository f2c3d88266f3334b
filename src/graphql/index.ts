/**
 * GraphQL integration - paginated relation fields and schema assembly
 *
 * @module graphql
 * @category GraphQL
 */

export { classifyHandler, FINDER_ARGUMENT } from './classifier';
export { generateHandlerArguments, toFieldConfigArguments, scalarType, IDS_ARGUMENT } from './arguments';
export type { ArgumentDescriptor } from './arguments';
export { startArgument, limitArgument, ResponsePaginationType, START_ARGUMENT, LIMIT_ARGUMENT } from './pagination';
export { formatResourceTypeName, formatConnectionTypeName, formatRootFieldName } from './naming';
export {
  buildPaginatedField,
  getConnectionType,
  paginatedComplexity,
  toFieldConfig,
} from './paginated-field';
export type { FieldDescriptor, FieldSource, PaginatedFieldOptions, ComplexityEstimator } from './paginated-field';
export { getElementType } from './resource-type';
export { TypeCache } from './type-cache';
export type { ElementType, ConnectionType } from './type-cache';
export { buildGraphQLSchema } from './schema-builder';
export type { SchemaBuildResult, SchemaBuildOptions } from './schema-builder';
