/**
 * GraphQL naming for resources.
 *
 * @module graphql/naming
 * @category GraphQL
 */

import type { ResourceName } from '../schema/types';

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Converts a resource name to a GraphQL type name.
 *
 * @example
 * ```typescript
 * formatResourceTypeName({ name: 'courses', version: 1 }); // 'CoursesV1'
 * ```
 */
export function formatResourceTypeName(resource: ResourceName): string {
  return `${capitalize(resource.name)}V${resource.version}`;
}

/**
 * Name of the connection type wrapping pages of a resource ('CoursesV1Connection').
 */
export function formatConnectionTypeName(resource: ResourceName): string {
  return `${formatResourceTypeName(resource)}Connection`;
}

/**
 * Name of a root query field for a resource handler.
 * The MULTI_GET field takes the bare name ('coursesV1'); finders append
 * their name ('coursesV1ByName').
 */
export function formatRootFieldName(resource: ResourceName, finderName?: string): string {
  const base = `${resource.name.charAt(0).toLowerCase()}${resource.name.slice(1)}V${resource.version}`;
  return finderName ? `${base}${capitalize(finderName)}` : base;
}
