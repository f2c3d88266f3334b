/**
 * Core type definitions for resource descriptors and relations.
 *
 * @module schema/types
 * @category Schema
 */

// ============================================================================
// Resource Identity
// ============================================================================

/**
 * Identity of a versioned REST resource.
 */
export interface ResourceName {
  name: string;
  version: number;
}

/**
 * Format a resource name as its lookup key.
 *
 * @example
 * ```typescript
 * resourceKey({ name: 'courses', version: 1 }); // 'courses.v1'
 * ```
 */
export function resourceKey(resource: ResourceName): string {
  return `${resource.name}.v${resource.version}`;
}

/**
 * Parse a lookup key back into a resource name.
 * Returns undefined when the key does not end in `.v<number>`.
 */
export function parseResourceKey(key: string): ResourceName | undefined {
  const match = /^(.+)\.v(\d+)$/.exec(key);
  if (!match) return undefined;
  return { name: match[1], version: Number(match[2]) };
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Kind of server operation a handler performs.
 */
export type HandlerKind = 'GET' | 'MULTI_GET' | 'FINDER' | 'SINGLE_ELEMENT_FINDER' | 'UNKNOWN';

/**
 * Scalar types available to handler parameters and element fields.
 */
export type ScalarType = 'id' | 'string' | 'int' | 'float' | 'boolean';

/**
 * Literal value a parameter default may take.
 */
export type ParameterValue = string | number | boolean | Array<string | number>;

/**
 * One declared parameter of a handler.
 */
export interface HandlerParameter {
  name: string;
  type: ScalarType;
  /** Whether the parameter takes a list of values */
  list: boolean;
  /** Whether callers must supply the parameter */
  required: boolean;
  default?: ParameterValue;
  description?: string;
}

/**
 * One named server operation on a resource.
 */
export interface Handler {
  name: string;
  kind: HandlerKind;
  parameters: HandlerParameter[];
}

// ============================================================================
// Relations
// ============================================================================

/**
 * Kind of lookup a reverse relation performs on its target.
 */
export type RelationType = 'FINDER' | 'MULTI_GET' | 'GET' | 'SINGLE_ELEMENT_FINDER' | 'UNKNOWN';

/**
 * The parent object holds the target identifiers directly.
 */
export interface ForwardRelation {
  kind: 'forward';
  /** Key of the target resource */
  target: string;
}

/**
 * The target resource is queried with bound arguments to recover objects
 * related to the parent.
 *
 * @example
 * ```typescript
 * const byInstructor: ReverseRelation = {
 *   kind: 'reverse',
 *   relationType: 'FINDER',
 *   arguments: { q: 'byInstructor', instructorId: '$id' },
 * };
 * ```
 */
export interface ReverseRelation {
  kind: 'reverse';
  relationType: RelationType;
  /** Parameter bindings; their keys are never exposed as field arguments */
  arguments: Record<string, string>;
}

export type RelationSpec = ForwardRelation | ReverseRelation;

/**
 * Compile-time exhaustiveness check for discriminated unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

// ============================================================================
// Element Schema
// ============================================================================

/**
 * A scalar field of a resource element.
 */
export interface ScalarField {
  type: ScalarType;
  list: boolean;
  nullable: boolean;
  description?: string;
}

/**
 * A paginated relation field of a resource element.
 */
export interface RelationField {
  /** Key of the target resource (e.g. 'instructors.v1') */
  target: string;
  relation: RelationSpec;
  description?: string;
}

/**
 * Shape of one element of a resource.
 */
export interface ElementSchema {
  fields: Record<string, ScalarField>;
  relations: Record<string, RelationField>;
}

// ============================================================================
// Resource Descriptor
// ============================================================================

/**
 * A versioned resource: its handlers and, when known, its element schema.
 */
export interface ResourceDescriptor {
  name: string;
  version: number;
  handlers: readonly Handler[];
  /** Absent when the element type cannot be resolved */
  schema?: ElementSchema;
  description?: string;
}

// ============================================================================
// Fetched Data
// ============================================================================

/**
 * Identifier as it appears in parent objects and top-level responses.
 */
export type Identifier = string | number;

/**
 * A fetched element. Relation fields hold the list of target identifiers.
 */
export type DataObject = Readonly<Record<string, unknown>>;

/**
 * Type guard for identifiers.
 */
export function isIdentifier(value: unknown): value is Identifier {
  return typeof value === 'string' || typeof value === 'number';
}
