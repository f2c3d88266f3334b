/**
 * Pagination field: `start` / `limit` arguments and the `paging` result type.
 *
 * @module graphql/pagination
 * @category GraphQL
 */

import { GraphQLInt, GraphQLObjectType, GraphQLString } from 'graphql';
import { getDefaults } from '../config';
import type { ExecutionContext } from '../runtime/context';
import { resolvePaging, type ParentLinkage } from '../runtime/resolver';
import type { ArgumentDescriptor } from './arguments';

export const START_ARGUMENT = 'start';
export const LIMIT_ARGUMENT = 'limit';

/**
 * Opaque cursor to start the page at (inclusive).
 */
export function startArgument(): ArgumentDescriptor {
  return {
    name: START_ARGUMENT,
    type: GraphQLString,
    description: 'Cursor of the first element to return',
  };
}

/**
 * Page size, defaulting to the configured limit.
 */
export function limitArgument(): ArgumentDescriptor {
  return {
    name: LIMIT_ARGUMENT,
    type: GraphQLInt,
    defaultValue: getDefaults().limit,
    description: 'Maximum number of elements to return',
  };
}

/**
 * Shared `ResponsePagination` type. Its source is the untouched linkage of the
 * connection, so cursors are computed from the same identifiers as the page.
 */
export const ResponsePaginationType = new GraphQLObjectType<ParentLinkage, ExecutionContext>({
  name: 'ResponsePagination',
  fields: {
    next: {
      type: GraphQLString,
      description: 'Cursor of the next page; absent on the last page',
      resolve: (linkage, _args, context) => resolvePaging(context, linkage).next,
    },
    total: {
      type: GraphQLInt,
      description: 'Total number of elements, when known',
      resolve: (linkage, _args, context) => resolvePaging(context, linkage).total,
    },
  },
});
