/**
 * Resource Registry - Manages resource registration and lookup
 *
 * @module runtime/registry
 * @category Runtime
 */

import { getLogger } from '../config';
import type { ElementSchema, ResourceDescriptor, ResourceName } from '../schema/types';
import { resourceKey } from '../schema/types';

/**
 * Read-only schema metadata consumed by schema construction.
 * Implemented by {@link ResourceRegistry}; any other source of resource
 * descriptors can stand in.
 */
export interface SchemaMetadata {
  /** Look up a resource by key ('courses.v1') or by name and version */
  getResource(name: string | ResourceName): ResourceDescriptor | undefined;
  /** Element schema of a resource, when it is known */
  getSchema(resource: ResourceDescriptor): ElementSchema | undefined;
  /** All resources, in registration order */
  getResources(): ResourceDescriptor[];
}

/**
 * Resource Registry holds every registered resource descriptor.
 *
 * @example
 * ```typescript
 * import { ResourceRegistry } from 'restgraph/runtime';
 *
 * const registry = new ResourceRegistry();
 * registry.register(Courses);
 * registry.register(Instructors);
 *
 * const courses = registry.getResource('courses.v1');
 * ```
 */
export class ResourceRegistry implements SchemaMetadata {
  private resources = new Map<string, ResourceDescriptor>();

  constructor(resources: ResourceDescriptor[] = []) {
    for (const resource of resources) {
      this.register(resource);
    }
  }

  /**
   * Register a resource descriptor
   */
  register(resource: ResourceDescriptor): void {
    const key = resourceKey(resource);
    if (this.resources.has(key)) {
      getLogger().warn(`Resource '${key}' is already registered. Overwriting.`);
    }
    this.resources.set(key, resource);
  }

  getResource(name: string | ResourceName): ResourceDescriptor | undefined {
    return this.resources.get(typeof name === 'string' ? name : resourceKey(name));
  }

  /**
   * Get a resource by key, throws if not found
   * @throws Error if resource not found
   */
  getResourceOrThrow(name: string | ResourceName): ResourceDescriptor {
    const resource = this.getResource(name);
    if (!resource) {
      const key = typeof name === 'string' ? name : resourceKey(name);
      throw new Error(`Resource '${key}' not found. Did you forget to register it?`);
    }
    return resource;
  }

  getSchema(resource: ResourceDescriptor): ElementSchema | undefined {
    return resource.schema;
  }

  getResources(): ResourceDescriptor[] {
    return Array.from(this.resources.values());
  }

  /**
   * Check if a resource is registered
   */
  has(name: string | ResourceName): boolean {
    return this.getResource(name) !== undefined;
  }

  /**
   * Keys of resources whose relations point at `target`
   */
  getResourcesReferencing(target: string): string[] {
    const result: string[] = [];
    for (const [key, resource] of this.resources) {
      const relations = Object.values(resource.schema?.relations ?? {});
      if (relations.some((relation) => relation.target === target)) {
        result.push(key);
      }
    }
    return result;
  }

  /**
   * Clear all registered resources
   */
  clear(): void {
    this.resources.clear();
  }

  get size(): number {
    return this.resources.size;
  }
}
