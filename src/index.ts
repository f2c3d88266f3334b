/**
 * restgraph - Paginated GraphQL relations over versioned REST resources
 *
 * @packageDocumentation
 */

// Resource DSL
export * from './schema';

// Runtime
export * from './runtime';

// GraphQL
export * from './graphql';

// Errors
export {
  SchemaGenerationError,
  ResourceDefinitionError,
  ok,
  err,
  type Result,
  type SchemaError,
  type SchemaErrorKind,
} from './errors';

// Configuration
export { configure, getDefaults, getLogger, resetConfig } from './config';
export type { GraphConfig, GraphDefaults } from './config';

// Logging
export { createLogger, createSilentLogger, createVerboseLogger } from './logger';
export type { Logger, LoggerConfig, LogLevel } from './logger';
