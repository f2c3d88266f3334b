/**
 * Field, parameter and handler builder functions for the resource DSL.
 * Builders are immutable: every modifier returns a new builder.
 *
 * @module schema/field
 * @category Schema
 *
 * @example
 * ```typescript
 * import { field, param, handler } from 'restgraph/schema';
 *
 * const fields = {
 *   id: field.id(),
 *   name: field.string(),
 *   tags: field.string({ list: true }).nullable(),
 * };
 *
 * const handlers = [
 *   handler.get(),
 *   handler.multiGet(),
 *   handler.finder('byName', [param.string('name').required()]),
 * ];
 * ```
 */

import type { Handler, HandlerKind, HandlerParameter, ParameterValue, ScalarField, ScalarType } from './types';

// ============================================================================
// Element Fields
// ============================================================================

/**
 * Chainable scalar field. Fields are non-null unless marked `nullable()`.
 */
export interface FieldBuilder {
  type: ScalarType;
  isList: boolean;
  isNullable: boolean;
  description?: string;
  nullable(): FieldBuilder;
  describe(description: string): FieldBuilder;
}

type FieldState = Pick<FieldBuilder, 'type' | 'isList' | 'isNullable' | 'description'>;

function createFieldBuilder(state: FieldState): FieldBuilder {
  return {
    ...state,
    nullable() {
      return createFieldBuilder({ ...state, isNullable: true });
    },
    describe(description: string) {
      return createFieldBuilder({ ...state, description });
    },
  };
}

function scalar(type: ScalarType, opts?: { list?: boolean }): FieldBuilder {
  return createFieldBuilder({ type, isList: opts?.list ?? false, isNullable: false });
}

export const field = {
  /** Opaque identifier, exposed as GraphQL `ID` */
  id: (opts?: { list?: boolean }) => scalar('id', opts),
  string: (opts?: { list?: boolean }) => scalar('string', opts),
  int: (opts?: { list?: boolean }) => scalar('int', opts),
  float: (opts?: { list?: boolean }) => scalar('float', opts),
  boolean: (opts?: { list?: boolean }) => scalar('boolean', opts),
};

/**
 * Type guard for field builders
 */
export function isFieldBuilder(value: FieldBuilder | ScalarField): value is FieldBuilder {
  return 'isNullable' in value;
}

/**
 * Convert a FieldBuilder or ScalarField to a plain ScalarField
 */
export function toScalarField(value: FieldBuilder | ScalarField): ScalarField {
  if (!isFieldBuilder(value)) {
    return value;
  }
  const result: ScalarField = { type: value.type, list: value.isList, nullable: value.isNullable };
  if (value.description !== undefined) {
    result.description = value.description;
  }
  return result;
}

// ============================================================================
// Handler Parameters
// ============================================================================

/**
 * Chainable handler parameter. Parameters are optional unless marked `required()`.
 */
export interface ParameterBuilder {
  name: string;
  type: ScalarType;
  isList: boolean;
  isRequired: boolean;
  defaultValue?: ParameterValue;
  description?: string;
  required(): ParameterBuilder;
  list(): ParameterBuilder;
  default(value: ParameterValue): ParameterBuilder;
  describe(description: string): ParameterBuilder;
}

type ParameterState = Pick<ParameterBuilder, 'name' | 'type' | 'isList' | 'isRequired' | 'defaultValue' | 'description'>;

function createParameterBuilder(state: ParameterState): ParameterBuilder {
  return {
    ...state,
    required() {
      return createParameterBuilder({ ...state, isRequired: true });
    },
    list() {
      return createParameterBuilder({ ...state, isList: true });
    },
    default(value: ParameterValue) {
      return createParameterBuilder({ ...state, defaultValue: value });
    },
    describe(description: string) {
      return createParameterBuilder({ ...state, description });
    },
  };
}

function parameter(type: ScalarType) {
  return (name: string): ParameterBuilder => createParameterBuilder({ name, type, isList: false, isRequired: false });
}

export const param = {
  id: parameter('id'),
  string: parameter('string'),
  int: parameter('int'),
  float: parameter('float'),
  boolean: parameter('boolean'),
};

/**
 * Type guard for parameter builders
 */
export function isParameterBuilder(value: ParameterBuilder | HandlerParameter): value is ParameterBuilder {
  return 'isRequired' in value;
}

/**
 * Convert a ParameterBuilder or HandlerParameter to a plain HandlerParameter
 */
export function toHandlerParameter(value: ParameterBuilder | HandlerParameter): HandlerParameter {
  if (!isParameterBuilder(value)) {
    return value;
  }
  const result: HandlerParameter = {
    name: value.name,
    type: value.type,
    list: value.isList,
    required: value.isRequired,
  };
  if (value.defaultValue !== undefined) result.default = value.defaultValue;
  if (value.description !== undefined) result.description = value.description;
  return result;
}

// ============================================================================
// Handlers
// ============================================================================

type ParameterInput = ParameterBuilder | HandlerParameter;

function createHandler(name: string, kind: HandlerKind, parameters: ParameterInput[]): Handler {
  return { name, kind, parameters: parameters.map(toHandlerParameter) };
}

/**
 * Handler builders. `multiGet` always declares the `ids` list parameter the
 * fetch layer fills in.
 */
export const handler = {
  get(parameters: ParameterInput[] = []): Handler {
    return createHandler('get', 'GET', [param.id('id').required(), ...parameters]);
  },

  multiGet(parameters: ParameterInput[] = []): Handler {
    return createHandler('multiGet', 'MULTI_GET', [param.id('ids').list().required(), ...parameters]);
  },

  finder(name: string, parameters: ParameterInput[] = []): Handler {
    return createHandler(name, 'FINDER', parameters);
  },

  singleElementFinder(name: string, parameters: ParameterInput[] = []): Handler {
    return createHandler(name, 'SINGLE_ELEMENT_FINDER', parameters);
  },

  custom(name: string, kind: HandlerKind, parameters: ParameterInput[] = []): Handler {
    return createHandler(name, kind, parameters);
  },
};
