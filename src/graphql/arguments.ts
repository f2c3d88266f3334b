/**
 * Argument generation for handler-backed fields.
 *
 * @module graphql/arguments
 * @category GraphQL
 */

import {
  GraphQLBoolean,
  GraphQLFloat,
  GraphQLID,
  GraphQLInt,
  GraphQLList,
  GraphQLNonNull,
  GraphQLString,
  type GraphQLFieldConfigArgumentMap,
  type GraphQLInputType,
  type GraphQLScalarType,
} from 'graphql';
import type { Handler, HandlerParameter, ParameterValue, ScalarType } from '../schema/types';
import { LIMIT_ARGUMENT, limitArgument, START_ARGUMENT, startArgument } from './pagination';

/**
 * One argument of a generated field.
 */
export interface ArgumentDescriptor {
  name: string;
  type: GraphQLInputType;
  defaultValue?: ParameterValue;
  description?: string;
}

/**
 * Name of the identifier-list parameter of MULTI_GET handlers.
 * The engine derives identifiers itself, so it is never exposed.
 */
export const IDS_ARGUMENT = 'ids';

const SCALARS: Record<ScalarType, GraphQLScalarType> = {
  id: GraphQLID,
  string: GraphQLString,
  int: GraphQLInt,
  float: GraphQLFloat,
  boolean: GraphQLBoolean,
};

/**
 * GraphQL scalar for a descriptor scalar type.
 */
export function scalarType(type: ScalarType): GraphQLScalarType {
  return SCALARS[type];
}

function parameterType(parameter: HandlerParameter): GraphQLInputType {
  const scalar = scalarType(parameter.type);
  const base = parameter.list ? new GraphQLList(new GraphQLNonNull(scalar)) : scalar;
  return parameter.required && parameter.default === undefined ? new GraphQLNonNull(base) : base;
}

/**
 * Arguments of a handler-backed field, in order: pagination arguments (when
 * requested) followed by the handler's parameters as declared. With
 * pagination, parameters named `start` or `limit` are left out.
 *
 * @example
 * ```typescript
 * generateHandlerArguments(handler.finder('byName', [param.string('name').required()]), true)
 *   .map((arg) => `${arg.name}: ${arg.type}`);
 * // ['start: String', 'limit: Int', 'name: String!']
 * ```
 */
export function generateHandlerArguments(handler: Handler, includePagination: boolean): ArgumentDescriptor[] {
  const pagination = includePagination ? [startArgument(), limitArgument()] : [];
  const reserved = new Set(includePagination ? [START_ARGUMENT, LIMIT_ARGUMENT] : []);
  const parameters = handler.parameters
    .filter((parameter) => !reserved.has(parameter.name))
    .map((parameter): ArgumentDescriptor => {
      const descriptor: ArgumentDescriptor = { name: parameter.name, type: parameterType(parameter) };
      if (parameter.default !== undefined) descriptor.defaultValue = parameter.default;
      if (parameter.description !== undefined) descriptor.description = parameter.description;
      return descriptor;
    });
  return [...pagination, ...parameters];
}

/**
 * Convert argument descriptors to a graphql-js argument map.
 */
export function toFieldConfigArguments(descriptors: readonly ArgumentDescriptor[]): GraphQLFieldConfigArgumentMap {
  const map: GraphQLFieldConfigArgumentMap = {};
  for (const descriptor of descriptors) {
    map[descriptor.name] = {
      type: descriptor.type,
      defaultValue: descriptor.defaultValue,
      description: descriptor.description,
    };
  }
  return map;
}
