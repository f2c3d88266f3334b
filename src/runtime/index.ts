/**
 * Runtime - resource lookup, fetched responses and page resolution
 *
 * @module runtime
 * @category Runtime
 *
 * @example
 * ```typescript
 * import { ResourceRegistry, ResponseBuilder, resolveElements } from 'restgraph/runtime';
 *
 * const registry = new ResourceRegistry([Courses, Instructors]);
 * const context = new ResponseBuilder()
 *   .addObjects('instructors.v1', [{ id: 1, fullName: 'Ada' }])
 *   .build();
 * ```
 */

// Resource Registry
export { ResourceRegistry } from './registry';
export type { SchemaMetadata } from './registry';

// Execution Context
export { ResponseBuilder, emptyExecutionContext, identifierKey } from './context';
export type {
  ExecutionContext,
  FetchedResponse,
  RequestSelection,
  ResponsePagination,
  TopLevelRequest,
  TopLevelResponse,
} from './context';

// Page Resolution
export {
  resolveElements,
  resolveIdentifiers,
  resolvePaging,
  windowIdentifiers,
  findTopLevelResponse,
  referencedIdentifiers,
  isTopLevel,
} from './resolver';
export type { ParentLinkage, PageArgs, IdentifierWindow } from './resolver';
