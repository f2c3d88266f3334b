/**
 * Error taxonomy for schema construction.
 *
 * Field-level failures are reported as {@link SchemaError} values so a schema
 * assembler can skip one field and keep building the rest. Exceptions are
 * reserved for structurally absent metadata found while constructing types.
 *
 * @module errors
 * @category Errors
 */

/**
 * Discriminator for schema-construction failures.
 */
export type SchemaErrorKind =
  | 'ResourceNotFound'
  | 'SchemaMissing'
  | 'MissingMultiGetHandler'
  | 'MissingFinderParameter'
  | 'PaginationNotSupportedForSingleElement'
  | 'NameConflict';

/**
 * A recoverable schema-construction failure for one field.
 */
export interface SchemaError {
  kind: SchemaErrorKind;
  /** Key of the resource being built (e.g. 'courses.v1') */
  resourceName: string;
  /** Field under construction, when known */
  fieldName?: string;
  message: string;
}

/**
 * Outcome of a schema-construction step.
 */
export type Result<T, E = SchemaError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function resourceNotFound(resourceName: string, fieldName?: string): SchemaError {
  return {
    kind: 'ResourceNotFound',
    resourceName,
    fieldName,
    message: `Resource '${resourceName}' is not registered`,
  };
}

export function schemaMissing(resourceName: string, fieldName?: string): SchemaError {
  return {
    kind: 'SchemaMissing',
    resourceName,
    fieldName,
    message: `Cannot find schema for '${resourceName}'`,
  };
}

export function missingMultiGetHandler(resourceName: string, fieldName: string): SchemaError {
  return {
    kind: 'MissingMultiGetHandler',
    resourceName,
    fieldName,
    message: `Field '${fieldName}' needs a MULTI_GET handler on '${resourceName}'`,
  };
}

export function missingFinderParameter(resourceName: string, fieldName: string): SchemaError {
  return {
    kind: 'MissingFinderParameter',
    resourceName,
    fieldName,
    message: `Finder relation '${fieldName}' must name a FINDER handler on '${resourceName}' through its 'q' argument`,
  };
}

export function paginationNotSupported(resourceName: string, fieldName: string): SchemaError {
  return {
    kind: 'PaginationNotSupportedForSingleElement',
    resourceName,
    fieldName,
    message: `Cannot use a paginated field for a single-element relationship: ${fieldName}`,
  };
}

/**
 * A GraphQL type or root field name that another resource already uses.
 */
export function nameConflict(resourceName: string, name: string, owner: string, fieldName?: string): SchemaError {
  return {
    kind: 'NameConflict',
    resourceName,
    fieldName,
    message: `GraphQL name '${name}' of '${resourceName}' is already used by '${owner}'`,
  };
}

/**
 * Thrown when type construction meets metadata that should have been
 * validated before the field was built.
 */
export class SchemaGenerationError extends Error {
  /** Error code for programmatic handling */
  readonly code = 'SCHEMA_GENERATION';

  /** The resource whose metadata was absent */
  readonly resourceName: string;

  constructor(resourceName: string, message?: string) {
    super(message ?? `Cannot find schema for ${resourceName}`);
    this.name = 'SchemaGenerationError';
    this.resourceName = resourceName;
  }
}

/**
 * Thrown by `defineResource` and `configure` when their input is malformed.
 */
export class ResourceDefinitionError extends Error {
  readonly code = 'INVALID_DEFINITION';

  /** One entry per failing path, formatted as `path: message` */
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super(`Invalid ${subject}:\n  ${issues.join('\n  ')}`);
    this.name = 'ResourceDefinitionError';
    this.issues = issues;
  }
}
