/**
 * Library Configuration - Global defaults and logger setup
 *
 * Holds the pagination default shared by argument generation, the cost
 * function and the resolver, plus the logger every module reports through.
 *
 * @module config
 * @category Configuration
 */

import { z } from 'zod';
import { createLogger, type Logger } from './logger';
import { parseOrThrow } from './schema/validation';

/**
 * Configuration options for the library.
 */
export interface GraphConfig {
  /** Logger used by schema construction and resolution */
  logger?: Logger;
  /** Default options */
  defaults?: {
    /** Default page size when a query omits `limit` */
    limit?: number;
    /** Cost multiplier applied to every paginated relation */
    complexityFactor?: number;
  };
}

/**
 * Resolved defaults.
 */
export interface GraphDefaults {
  limit: number;
  complexityFactor: number;
}

const DefaultsSchema = z.object({
  limit: z.number().int().positive().optional(),
  complexityFactor: z.number().positive().optional(),
}).strict();

const INITIAL_DEFAULTS: GraphDefaults = {
  limit: 20,
  complexityFactor: 10.0,
};

/**
 * Global configuration state.
 */
interface GraphState {
  logger: Logger;
  defaults: GraphDefaults;
}

/**
 * Global state singleton.
 */
const state: GraphState = {
  logger: createLogger(),
  defaults: { ...INITIAL_DEFAULTS },
};

/**
 * Configure the library.
 *
 * Call once at startup, before schemas are built: field descriptors capture
 * the defaults in effect when they are built.
 *
 * @example
 * ```typescript
 * import { configure, createLogger } from 'restgraph';
 *
 * configure({
 *   logger: createLogger({ level: 'info' }),
 *   defaults: { limit: 50 },
 * });
 * ```
 */
export function configure(config: GraphConfig): void {
  if (config.logger) {
    state.logger = config.logger;
  }

  if (config.defaults) {
    const defaults = parseOrThrow(DefaultsSchema, config.defaults, 'configuration defaults');
    state.defaults = {
      limit: defaults.limit ?? state.defaults.limit,
      complexityFactor: defaults.complexityFactor ?? state.defaults.complexityFactor,
    };
  }
}

/**
 * Get default configuration values.
 */
export function getDefaults(): Readonly<GraphDefaults> {
  return state.defaults;
}

/**
 * Get the configured logger.
 */
export function getLogger(): Logger {
  return state.logger;
}

/**
 * Reset configuration (mainly for testing).
 */
export function resetConfig(): void {
  state.logger = createLogger();
  state.defaults = { ...INITIAL_DEFAULTS };
}
